export type AppConfig = Readonly<{
  port: number;
  databaseUrl: string;
  corsOrigins: readonly string[];
  appName: string;
  appVersion: string;
  nodeEnv: string;
}>;

const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://localhost:5173'];

export function parseCorsOrigins(raw: string | undefined): string[] {
  if (!raw || !raw.trim()) {
    return [...DEFAULT_CORS_ORIGINS];
  }
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Read server settings from the environment. Throws when a value is unusable.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const databaseUrl = env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('DATABASE_URL must be set.');
  }

  const rawPort = env.PORT?.trim() || '3000';
  const port = Number.parseInt(rawPort, 10);
  if (!/^\d+$/.test(rawPort) || port < 1 || port > 65535) {
    throw new Error(`PORT must be between 1 and 65535, received "${rawPort}"`);
  }

  return Object.freeze({
    port,
    databaseUrl,
    corsOrigins: Object.freeze(parseCorsOrigins(env.CORS_ORIGINS)),
    appName: env.APP_NAME?.trim() || 'TaskHub',
    appVersion: env.APP_VERSION?.trim() || '1.0.0',
    nodeEnv: env.NODE_ENV ?? 'development',
  });
}
