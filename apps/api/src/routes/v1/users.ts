import { ChangePasswordSchema, UpdateProfileSchema } from '@taskhub/types';
import { Hono } from 'hono';
import { toUserResponse } from '../../lib/presenters.js';
import { validate } from '../../lib/validation.js';
import { requireAuth } from '../../middleware/auth.js';
import type { AppServices } from '../../services/index.js';
import type { AppBindings } from '../../types/context.js';

/**
 * Current user's profile and password
 */
export function createUserRoutes(services: Pick<AppServices, 'userService' | 'sessionService'>) {
  const userRoutes = new Hono<AppBindings>();

  userRoutes.use('*', requireAuth(services.sessionService));

  userRoutes.get('/me', (c) => c.json(toUserResponse(c.get('user'))));

  userRoutes.put('/me', validate('json', UpdateProfileSchema), async (c) => {
    const body = c.req.valid('json');

    const user = await services.userService.updateProfile(c.get('user'), {
      email: body.email,
      firstName: body.first_name,
      lastName: body.last_name,
    });

    return c.json(toUserResponse(user));
  });

  userRoutes.post('/me/change-password', validate('json', ChangePasswordSchema), async (c) => {
    const body = c.req.valid('json');

    await services.sessionService.changePassword(
      c.get('user'),
      body.current_password,
      body.new_password
    );

    return c.json({ message: 'Password updated successfully' });
  });

  return userRoutes;
}
