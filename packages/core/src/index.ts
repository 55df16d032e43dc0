/**
 * @taskhub/core - Domain logic for users, tasks and categories
 *
 * Services hold the business rules; repositories are the only code that
 * talks to the database. The API layer consumes both.
 */

export * from './errors.js';
export * from './ownership.js';
export * from './users/index.js';
export * from './categories/index.js';
export * from './tasks/index.js';
