/**
 * Registration, login and access token refresh
 */

import { BEARER_TOKEN_TYPE } from '@taskhub/auth';
import { RefreshTokenSchema, LoginSchema, RegisterSchema } from '@taskhub/types';
import { Hono } from 'hono';
import { extractIp } from '../../lib/client-ip.js';
import { toUserResponse } from '../../lib/presenters.js';
import { validate } from '../../lib/validation.js';
import type { AppServices } from '../../services/index.js';
import type { AppBindings } from '../../types/context.js';

export function createAuthRoutes(services: Pick<AppServices, 'userService' | 'sessionService'>) {
  const authRoutes = new Hono<AppBindings>();

  authRoutes.post('/register', validate('json', RegisterSchema), async (c) => {
    const body = c.req.valid('json');
    const ip = extractIp(c);

    const user = await services.userService.registerUser({
      username: body.username,
      email: body.email,
      password: body.password,
      firstName: body.first_name,
      lastName: body.last_name,
      ...(ip ? { ip } : {}),
    });

    return c.json(toUserResponse(user), 201);
  });

  authRoutes.post('/login', validate('json', LoginSchema), async (c) => {
    const { email, password } = c.req.valid('json');
    const tokens = await services.sessionService.login(email, password);

    return c.json({
      access_token: tokens.accessToken,
      refresh_token: tokens.refreshToken,
      token_type: BEARER_TOKEN_TYPE,
    });
  });

  authRoutes.post('/refresh', validate('json', RefreshTokenSchema), async (c) => {
    const { refresh_token } = c.req.valid('json');
    const { accessToken } = await services.sessionService.refresh(refresh_token);

    return c.json({ access_token: accessToken, token_type: BEARER_TOKEN_TYPE });
  });

  return authRoutes;
}
