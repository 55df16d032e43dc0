/**
 * Authentication middleware for protected routes.
 * Accepts `Authorization: Bearer <access token>` and stores the user in `c.get('user')`.
 */

import { type SessionService, UnauthorizedError, extractBearer } from '@taskhub/auth-core';
import type { User } from '@taskhub/core';
import type { MiddlewareHandler } from 'hono';
import type { AppBindings } from '../types/context.js';

export function requireAuth(
  sessions: Pick<SessionService<User>, 'authenticate'>
): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    const token = extractBearer(c.req.header('authorization'));
    if (!token) {
      throw new UnauthorizedError('Not authenticated');
    }

    // Verifier failures propagate to the error handler as 401s
    const user = await sessions.authenticate(token);
    c.set('user', user);

    await next();
  };
}
