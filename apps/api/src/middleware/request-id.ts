import type { Context, Next } from 'hono';
import { randomUUID } from 'node:crypto';

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Request ID middleware
 * Reuses an incoming request ID or generates one, and attaches it to the context
 * The request ID is used for log correlation and audit trails
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  // Check if request ID is already set (e.g., from load balancer)
  const existingRequestId = c.req.header('x-request-id') || c.req.header('x-correlation-id');

  const requestId =
    existingRequestId && existingRequestId.length <= MAX_REQUEST_ID_LENGTH
      ? existingRequestId
      : randomUUID();

  // Attach to context for use in handlers
  c.set('requestId', requestId);

  await next();

  // Set on the final response so error responses carry it too
  c.header('x-request-id', requestId);
}
