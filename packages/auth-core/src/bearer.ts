/**
 * Pull the token out of an `Authorization: Bearer <token>` header value.
 */
export function extractBearer(header?: string | null): string | null {
  if (!header) {
    return null;
  }
  const trimmed = header.trim();
  if (!trimmed.toLowerCase().startsWith('bearer ')) {
    return null;
  }
  const token = trimmed.slice(7).trim();
  return token.length > 0 ? token : null;
}
