/**
 * @taskhub/auth-core
 *
 * Token issuing and verification, session flows and auth errors.
 */
export { loadAuthCoreConfig, JWT_ALGORITHMS, MIN_SECRET_LENGTH } from './config.js';
export type { AuthCoreConfig, JwtAlgorithm } from './config.js';
export * from './errors.js';
export type { AuthUserRepository, TokenRevocationList } from './interfaces.js';
export { InMemoryTokenRevocationList } from './revocation.js';
export { TokenIssuer } from './token-issuer.js';
export { TokenVerifier } from './token-verifier.js';
export { SessionService } from './session-service.js';
export { extractBearer } from './bearer.js';
export {
  MAX_SUBJECT_ID,
  TOKEN_TYPES,
  TokenClaimsSchema,
  systemClock,
  toEpochSeconds,
} from './types.js';
export type {
  AuthUserRecord,
  Clock,
  IssuedToken,
  TokenClaims,
  TokenPair,
  TokenType,
  VerifiedToken,
} from './types.js';
