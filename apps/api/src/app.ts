import { type Logger, logger as defaultLogger } from '@taskhub/observability';
import { Hono } from 'hono';
import { corsMiddleware } from './middleware/cors.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { requestLogger } from './middleware/request-logger.js';
import { createHealthRoute } from './routes/health.js';
import { createRootRoute } from './routes/root.js';
import { createAuthRoutes } from './routes/v1/auth.js';
import { createCategoryRoutes } from './routes/v1/categories.js';
import { createTaskRoutes } from './routes/v1/tasks.js';
import { createUserRoutes } from './routes/v1/users.js';
import type { AppServices } from './services/index.js';
import type { AppBindings } from './types/context.js';

export const API_PREFIX = '/api/v1';

export type AppOptions = {
  appName: string;
  appVersion: string;
  corsOrigins: readonly string[];
  logger?: Logger;
};

export function createApp(services: AppServices, options: AppOptions) {
  const log = options.logger ?? defaultLogger;
  const app = new Hono<AppBindings>();

  // Request ID runs first so every log line and response carries it
  app.use('*', requestIdMiddleware);
  app.use('*', requestLogger(log));
  app.use('*', corsMiddleware(options.corsOrigins));

  app.route('/', createRootRoute(options.appName, options.appVersion));
  app.route('/health', createHealthRoute(services.checkDatabase));

  const v1 = new Hono<AppBindings>();
  v1.route('/auth', createAuthRoutes(services));
  v1.route('/users', createUserRoutes(services));
  v1.route('/tasks', createTaskRoutes(services));
  v1.route('/categories', createCategoryRoutes(services));
  app.route(API_PREFIX, v1);

  app.notFound((c) => c.json({ error: 'not_found', message: 'Not Found' }, 404));
  app.onError(createErrorHandler(log));

  return app;
}

export type App = ReturnType<typeof createApp>;
