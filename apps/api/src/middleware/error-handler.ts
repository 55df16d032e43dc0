import { UnauthorizedError } from '@taskhub/auth-core';
import { ConflictError, InvalidReferenceError, NotFoundError } from '@taskhub/core';
import type { Logger } from '@taskhub/observability';
import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { AppBindings } from '../types/context.js';

/**
 * Maps domain and auth errors to HTTP responses. Anything unrecognised is
 * logged and returned as a generic 500.
 */
export function createErrorHandler(log: Logger): ErrorHandler<AppBindings> {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    if (err instanceof UnauthorizedError) {
      c.header('WWW-Authenticate', 'Bearer');
      return c.json({ error: err.code, message: err.message }, 401);
    }

    if (err instanceof InvalidReferenceError) {
      return c.json({ error: err.code, message: err.message }, 400);
    }

    if (err instanceof NotFoundError) {
      return c.json({ error: 'not_found', message: err.message }, 404);
    }

    if (err instanceof ConflictError) {
      return c.json({ error: 'conflict', message: err.message }, 409);
    }

    log.error(
      { err, requestId: c.get('requestId'), method: c.req.method, path: c.req.path },
      'Unhandled error'
    );
    return c.json({ error: 'internal_error', message: 'Internal Server Error' }, 500);
  };
}
