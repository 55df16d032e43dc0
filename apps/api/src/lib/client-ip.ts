import type { Context } from 'hono';

/**
 * First hop of X-Forwarded-For, falling back to X-Real-IP
 */
export function extractIp(c: Context): string | undefined {
  const forwarded = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
  return forwarded || c.req.header('x-real-ip') || undefined;
}
