import type { AuthUserRecord } from './types.js';

export interface AuthUserRepository<TUser extends AuthUserRecord = AuthUserRecord> {
  findById(id: number): Promise<TUser | null>;
  findByEmail(email: string): Promise<TUser | null>;
  updatePasswordHash(id: number, passwordHash: string): Promise<void>;
}

/**
 * Consulted by the verifier after the expiry check. Not configured by default:
 * refresh tokens are stateless.
 */
export interface TokenRevocationList {
  isRevoked(jti: string): Promise<boolean>;
}
