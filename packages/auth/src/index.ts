/**
 * @taskhub/auth
 *
 * Authentication primitives
 * - Password hashing/verification
 * - Auth constants (scrypt parameters, token types, default lifetimes)
 * - Auth event emitter
 *
 * Token issuing, verification and session flows live in @taskhub/auth-core.
 */

// Password utilities
export { hashPassword, verifyPassword } from './password.js';

// Constants
export {
  SCRYPT_COST,
  SCRYPT_MIN_COST,
  SCRYPT_MAX_COST,
  SCRYPT_BLOCK_SIZE,
  SCRYPT_PARALLELIZATION,
  SCRYPT_KEY_LENGTH,
  PASSWORD_SALT_BYTES,
  PASSWORD_HASH_PREFIX,
  DEFAULT_ACCESS_TOKEN_TTL_MINUTES,
  DEFAULT_REFRESH_TOKEN_TTL_DAYS,
  BEARER_TOKEN_TYPE,
} from './constants.js';

// Events
export { AuthEventEmitter, authEvents } from './events.js';
export type {
  AuthEvent,
  AuthEventInput,
  AuthEventHandler,
  AuthEventSink,
  AuthEventType,
} from './events.js';
