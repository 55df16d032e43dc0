import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadAuthCoreConfig } from '@taskhub/auth-core';
import { createDatabase } from '@taskhub/database';
import { logger } from '@taskhub/observability';
import { createApp } from './app.js';
import { loadAppConfig } from './config.js';
import { initializeAuditLogging } from './lib/audit-logger.js';
import { createDatabaseServices } from './services/index.js';

const config = loadAppConfig();
const authConfig = loadAuthCoreConfig();
const database = createDatabase({ connectionString: config.databaseUrl });

initializeAuditLogging();

const app = createApp(createDatabaseServices(database.db, authConfig), {
  appName: config.appName,
  appVersion: config.appVersion,
  corsOrigins: config.corsOrigins,
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port, env: config.nodeEnv }, `${config.appName} API listening`);
});

function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down');
  server.close(() => {
    database.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Failed to close database pool');
        process.exit(1);
      }
    );
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
