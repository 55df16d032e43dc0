import { Hono } from 'hono';
import type { AppBindings } from '../types/context.js';

export function createRootRoute(appName: string, version: string) {
  const rootRoute = new Hono<AppBindings>();

  rootRoute.get('/', (c) => c.json({ message: `Welcome to ${appName}`, version }));

  return rootRoute;
}
