import { DEFAULT_ACCESS_TOKEN_TTL_MINUTES, DEFAULT_REFRESH_TOKEN_TTL_DAYS } from '@taskhub/auth';

export const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

export const MIN_SECRET_LENGTH = 32;
const DEFAULT_ISSUER = 'taskhub';

export type AuthCoreConfig = Readonly<{
  secret: string;
  algorithm: JwtAlgorithm;
  issuer: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
}>;

function isJwtAlgorithm(value: string): value is JwtAlgorithm {
  return JWT_ALGORITHMS.some((algorithm) => algorithm === value);
}

function readPositiveInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  if (!/^\d+$/.test(raw) || Number.parseInt(raw, 10) <= 0) {
    throw new Error(`${name} must be a positive integer, received "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

/**
 * Read signing configuration once at startup. Throws on missing or invalid values.
 */
export function loadAuthCoreConfig(env: NodeJS.ProcessEnv = process.env): AuthCoreConfig {
  const secret = env.AUTH_SECRET;
  if (!secret) {
    throw new Error('AUTH_SECRET must be set to sign tokens.');
  }
  if (secret.length < MIN_SECRET_LENGTH) {
    throw new Error(`AUTH_SECRET must be at least ${MIN_SECRET_LENGTH} characters long.`);
  }

  const algorithm = env.AUTH_JWT_ALGORITHM?.trim() || 'HS256';
  if (!isJwtAlgorithm(algorithm)) {
    throw new Error(`Unsupported AUTH_JWT_ALGORITHM value: ${algorithm}`);
  }

  const accessMinutes = readPositiveInteger(
    env,
    'AUTH_ACCESS_TOKEN_TTL_MINUTES',
    DEFAULT_ACCESS_TOKEN_TTL_MINUTES
  );
  const refreshDays = readPositiveInteger(
    env,
    'AUTH_REFRESH_TOKEN_TTL_DAYS',
    DEFAULT_REFRESH_TOKEN_TTL_DAYS
  );

  return Object.freeze({
    secret,
    algorithm,
    issuer: env.AUTH_JWT_ISSUER?.trim() || DEFAULT_ISSUER,
    accessTokenTtlSeconds: accessMinutes * 60,
    refreshTokenTtlSeconds: refreshDays * 24 * 60 * 60,
  });
}
