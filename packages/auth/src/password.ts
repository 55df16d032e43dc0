/**
 * Password hashing and verification utilities
 * Uses Node's built-in scrypt for secure password storage (no native addons needed)
 */
import {
  type BinaryLike,
  type ScryptOptions,
  randomBytes,
  scrypt as scryptCallback,
  timingSafeEqual,
} from 'node:crypto';
import { promisify } from 'node:util';
import {
  PASSWORD_HASH_PREFIX,
  PASSWORD_SALT_BYTES,
  SCRYPT_BLOCK_SIZE,
  SCRYPT_COST,
  SCRYPT_KEY_LENGTH,
  SCRYPT_MAX_COST,
  SCRYPT_MIN_COST,
  SCRYPT_PARALLELIZATION,
} from './constants.js';

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;
const MAX_KEY_LENGTH = 256;

const scrypt: (
  password: BinaryLike,
  salt: BinaryLike,
  keyLength: number,
  options: ScryptOptions
) => Promise<Buffer> = promisify(scryptCallback);

function deriveKey(password: string, salt: Buffer, keyLength: number, cost: number) {
  return scrypt(password, salt, keyLength, {
    N: cost,
    r: SCRYPT_BLOCK_SIZE,
    p: SCRYPT_PARALLELIZATION,
    maxmem: 256 * cost * SCRYPT_BLOCK_SIZE,
  });
}

function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0;
}

/**
 * Hash a password using scrypt
 * @returns self-describing hash: `scrypt$<cost>$<salt b64>$<key b64>`
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(PASSWORD_SALT_BYTES);
  const derivedKey = await deriveKey(password, salt, SCRYPT_KEY_LENGTH, SCRYPT_COST);
  return [
    PASSWORD_HASH_PREFIX,
    String(SCRYPT_COST),
    salt.toString('base64'),
    derivedKey.toString('base64'),
  ].join('$');
}

/**
 * Verify a password against a scrypt hash
 * Uses constant-time comparison. A malformed stored hash verifies as false.
 */
export async function verifyPassword(password: string, hashedPassword: string): Promise<boolean> {
  const parts = hashedPassword.split('$');
  if (parts.length !== 4) {
    return false;
  }

  const [prefix, costStr, saltB64, keyB64] = parts;
  if (prefix !== PASSWORD_HASH_PREFIX || !costStr || !saltB64 || !keyB64) {
    return false;
  }
  if (!/^\d+$/.test(costStr) || !BASE64.test(saltB64) || !BASE64.test(keyB64)) {
    return false;
  }

  const cost = Number.parseInt(costStr, 10);
  if (!isPowerOfTwo(cost) || cost < SCRYPT_MIN_COST || cost > SCRYPT_MAX_COST) {
    return false;
  }

  const salt = Buffer.from(saltB64, 'base64');
  const storedKey = Buffer.from(keyB64, 'base64');
  if (salt.length === 0 || storedKey.length === 0 || storedKey.length > MAX_KEY_LENGTH) {
    return false;
  }

  const derivedKey = await deriveKey(password, salt, storedKey.length, cost);
  return timingSafeEqual(storedKey, derivedKey);
}
