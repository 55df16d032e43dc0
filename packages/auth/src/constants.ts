/**
 * Authentication constants
 * Single source of truth for auth configuration
 */

// Password hashing (scrypt). 128 * N * r bytes of memory per hash.
export const SCRYPT_COST = 16384;
export const SCRYPT_MIN_COST = 1024;
export const SCRYPT_MAX_COST = 65536;
export const SCRYPT_BLOCK_SIZE = 8;
export const SCRYPT_PARALLELIZATION = 1;
export const SCRYPT_KEY_LENGTH = 64;
export const PASSWORD_SALT_BYTES = 16;
export const PASSWORD_HASH_PREFIX = 'scrypt';

// Token lifetimes used when configuration does not override them
export const DEFAULT_ACCESS_TOKEN_TTL_MINUTES = 30;
export const DEFAULT_REFRESH_TOKEN_TTL_DAYS = 7;

// Value of `token_type` in login/refresh responses
export const BEARER_TOKEN_TYPE = 'bearer';
