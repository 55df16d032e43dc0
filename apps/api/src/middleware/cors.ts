import { cors } from 'hono/cors';

/**
 * CORS for the configured origins. Credentials are not used: clients send
 * bearer tokens, never cookies.
 */
export function corsMiddleware(allowedOrigins: readonly string[]) {
  const allowed = new Set(allowedOrigins);

  return cors({
    origin: (origin) => (origin && allowed.has(origin) ? origin : ''),
    allowMethods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    exposeHeaders: ['X-Request-Id'],
    maxAge: 86400, // 24 hours - browser caches preflight response
  });
}
