/**
 * @taskhub/observability
 *
 * Structured logging for the TaskHub API.
 */

export { createLogger, logger, redactTokens, redactObjectTokens } from './logger.js';
export type { Logger } from './logger.js';
