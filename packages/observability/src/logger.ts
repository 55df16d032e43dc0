import pino from 'pino';

/**
 * Redact sensitive data from logs
 * - Authorization headers (Bearer tokens)
 * - Issued access/refresh tokens
 * - Passwords and password hashes
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.Authorization',
  'headers.authorization',
  'headers.Authorization',
  'authorization',
  'Authorization',
  'password',
  'current_password',
  'new_password',
  'passwordHash',
  'password_hash',
  'access_token',
  'refresh_token',
  'accessToken',
  'refreshToken',
  'token',
  'secret',
  '*.password',
  '*.passwordHash',
  '*.access_token',
  '*.refresh_token',
];

const JWT_PATTERN = /eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g;

/**
 * Mask bearer credentials and compact JWTs embedded in string values
 */
export function redactTokens(value: string): string {
  if (value.startsWith('Bearer ')) {
    return 'Bearer [REDACTED]';
  }
  return value.replace(JWT_PATTERN, '[REDACTED_JWT]');
}

/**
 * Recursively redact tokens in an object
 */
export function redactObjectTokens(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactTokens(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactObjectTokens);
  }
  if (value instanceof Error || value instanceof Date) {
    return value;
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = redactObjectTokens(entry);
    }
    return result;
  }
  return value;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of sensitive data (tokens, passwords)
 * - Request ID correlation support via child loggers
 * - Structured JSON output
 */
export function createLogger(
  options: pino.LoggerOptions = {},
  destination?: pino.DestinationStream
): pino.Logger {
  const config: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log(object) {
        const redacted = redactObjectTokens(object);
        return redacted && typeof redacted === 'object' && !Array.isArray(redacted)
          ? { ...redacted }
          : object;
      },
    },
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

export type Logger = pino.Logger;

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
