/**
 * HTTP test helpers for route tests
 * Builds the app over in-memory repositories and drives it through app.fetch
 */

import type { AuthEventSink } from '@taskhub/auth';
import { loadAuthCoreConfig } from '@taskhub/auth-core';
import { createInMemoryRepositories } from '@taskhub/core/testing';
import { createLogger } from '@taskhub/observability';
import type { Env, Hono } from 'hono';
import { z } from 'zod';
import { createApp } from '../app.js';
import { createServices } from '../services/index.js';

export const TEST_PASSWORD = 'password123';

export const testAuthConfig = loadAuthCoreConfig({
  AUTH_SECRET: 'test-secret-test-secret-test-secret',
  AUTH_JWT_ISSUER: 'taskhub-test',
});

export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Make an HTTP request to the Hono app
 */
export async function makeRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { body, headers = {} } = options;

  const init: RequestInit = {
    method: method.toUpperCase(),
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = typeof body === 'string' ? body : JSON.stringify(body);
  }

  return app.fetch(new Request(`http://localhost${path}`, init));
}

/**
 * Make an authenticated HTTP request with a Bearer access token.
 */
export async function makeAuthenticatedRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  accessToken: string,
  options: RequestOptions = {}
): Promise<Response> {
  return makeRequest(app, method, path, {
    ...options,
    headers: { ...options.headers, Authorization: `Bearer ${accessToken}` },
  });
}

/**
 * Parse a JSON response body against the shape a test relies on
 */
export async function readJson<T extends z.ZodTypeAny>(
  response: Response,
  schema: T
): Promise<z.infer<T>> {
  return schema.parse(await response.json());
}

export const ErrorBody = z.object({ error: z.string(), message: z.string() });
export const ValidationErrorBody = ErrorBody.extend({
  issues: z.array(z.object({ path: z.string(), message: z.string() })),
});
export const TokenBody = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  token_type: z.literal('bearer'),
});
export const IdBody = z.object({ id: z.number() }).passthrough();

type TestAppOptions = {
  now?: () => Date;
  checkDatabase?: () => Promise<void>;
  events?: AuthEventSink;
};

export function createTestApp(options: TestAppOptions = {}) {
  const repositories = createInMemoryRepositories(options.now);
  const events: AuthEventSink = options.events ?? { emit: () => undefined };

  const services = createServices({
    repositories,
    authConfig: testAuthConfig,
    checkDatabase: options.checkDatabase ?? (async () => undefined),
    events,
    now: options.now,
  });

  const app = createApp(services, {
    appName: 'TaskHub',
    appVersion: '1.0.0',
    corsOrigins: ['http://localhost:5173'],
    logger: createLogger({ level: 'silent' }),
  });

  return { app, services, repositories };
}

type TestApp = ReturnType<typeof createTestApp>['app'];

let userCounter = 0;

/**
 * Register a fresh user and log in. Returns the user id and both tokens.
 */
export async function registerAndLogin(app: TestApp, overrides: { username?: string } = {}) {
  userCounter += 1;
  const username = overrides.username ?? `user${userCounter}`;
  const email = `${username}@example.com`;

  const registered = await makeRequest(app, 'POST', '/api/v1/auth/register', {
    body: { username, email, password: TEST_PASSWORD },
  });
  const { id } = await readJson(registered, IdBody);

  const login = await makeRequest(app, 'POST', '/api/v1/auth/login', {
    body: { email, password: TEST_PASSWORD },
  });
  const tokens = await readJson(login, TokenBody);

  return {
    id,
    email,
    username,
    accessToken: tokens.access_token,
    refreshToken: tokens.refresh_token,
  };
}
