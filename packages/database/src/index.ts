export * from './schema.js';
export { createDatabase } from './client.js';
export type {
  Database,
  DatabaseClient,
  DatabaseOptions,
  DatabaseOrTransaction,
  DatabaseTransaction,
} from './client.js';
export {
  PG_UNIQUE_VIOLATION,
  UniqueConstraintError,
  toUniqueConstraintError,
  withUniqueConstraint,
} from './errors.js';
export { pingDatabase } from './health.js';
