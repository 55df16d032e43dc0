import { logger } from '@taskhub/observability';
import { Hono } from 'hono';
import type { AppBindings } from '../types/context.js';

/**
 * 200 while the database answers, 503 otherwise
 */
export function createHealthRoute(checkDatabase: () => Promise<void>) {
  const healthRoute = new Hono<AppBindings>();

  healthRoute.get('/', async (c) => {
    const timestamp = new Date().toISOString();

    try {
      await checkDatabase();
    } catch (error) {
      logger.warn({ err: error, requestId: c.get('requestId') }, 'Database health check failed');
      return c.json({ status: 'unhealthy', database: 'unavailable', timestamp }, 503);
    }

    return c.json({ status: 'healthy', database: 'connected', timestamp });
  });

  return healthRoute;
}
