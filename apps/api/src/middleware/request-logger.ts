import type { Logger } from '@taskhub/observability';
import type { MiddlewareHandler } from 'hono';
import type { AppBindings } from '../types/context.js';

/**
 * One structured log line per request
 */
export function requestLogger(log: Logger): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    const startedAt = performance.now();
    await next();

    const status = c.res.status;
    const entry = {
      requestId: c.get('requestId'),
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Math.round(performance.now() - startedAt),
    };

    if (status >= 500) {
      log.error(entry, 'Request failed');
    } else {
      log.info(entry, 'Request completed');
    }
  };
}
