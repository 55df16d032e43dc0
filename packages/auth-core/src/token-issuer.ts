import { randomUUID } from 'node:crypto';
import { SignJWT } from 'jose';
import type { AuthCoreConfig } from './config.js';
import {
  type Clock,
  type IssuedToken,
  type TokenClaims,
  type TokenType,
  systemClock,
  toEpochSeconds,
} from './types.js';

type TokenIssuerDependencies = {
  config: AuthCoreConfig;
  clock?: Clock;
};

/**
 * Mints HMAC-signed access and refresh tokens bound to a user id.
 */
export class TokenIssuer {
  private readonly config: AuthCoreConfig;
  private readonly clock: Clock;
  private readonly key: Uint8Array;

  constructor(dependencies: TokenIssuerDependencies) {
    this.config = dependencies.config;
    this.clock = dependencies.clock ?? systemClock;
    this.key = new TextEncoder().encode(this.config.secret);
  }

  issueAccessToken(userId: number): Promise<IssuedToken> {
    return this.issue(userId, 'access', this.config.accessTokenTtlSeconds);
  }

  issueRefreshToken(userId: number): Promise<IssuedToken> {
    return this.issue(userId, 'refresh', this.config.refreshTokenTtlSeconds);
  }

  private async issue(userId: number, tokenType: TokenType, ttlSeconds: number): Promise<IssuedToken> {
    const iat = toEpochSeconds(this.clock());
    const claims: TokenClaims = {
      sub: String(userId),
      token_type: tokenType,
      iat,
      exp: iat + ttlSeconds,
      jti: randomUUID(),
      iss: this.config.issuer,
    };

    const token = await new SignJWT({ token_type: claims.token_type })
      .setProtectedHeader({ alg: this.config.algorithm, typ: 'JWT' })
      .setSubject(claims.sub)
      .setIssuedAt(claims.iat)
      .setExpirationTime(claims.exp)
      .setJti(claims.jti)
      .setIssuer(claims.iss)
      .sign(this.key);

    return { token, claims };
  }
}
