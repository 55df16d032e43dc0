import { compactVerify } from 'jose';
import type { AuthCoreConfig } from './config.js';
import {
  InactiveUserError,
  InvalidTokenError,
  TokenExpiredError,
  TokenRevokedError,
  TokenUserNotFoundError,
  WrongTokenTypeError,
} from './errors.js';
import type { AuthUserRepository, TokenRevocationList } from './interfaces.js';
import {
  type AuthUserRecord,
  type Clock,
  type TokenClaims,
  TokenClaimsSchema,
  type TokenType,
  type VerifiedToken,
  systemClock,
  toEpochSeconds,
} from './types.js';

type TokenVerifierDependencies<TUser extends AuthUserRecord> = {
  config: AuthCoreConfig;
  users: Pick<AuthUserRepository<TUser>, 'findById'>;
  revocationList?: TokenRevocationList;
  clock?: Clock;
};

/**
 * Validates a bearer token and resolves its subject.
 *
 * Checks run in a fixed order: signature and claim shape, token type,
 * expiry, revocation, then the user lookup. The first failure is thrown.
 */
export class TokenVerifier<TUser extends AuthUserRecord> {
  private readonly config: AuthCoreConfig;
  private readonly users: Pick<AuthUserRepository<TUser>, 'findById'>;
  private readonly revocationList: TokenRevocationList | undefined;
  private readonly clock: Clock;
  private readonly key: Uint8Array;

  constructor(dependencies: TokenVerifierDependencies<TUser>) {
    this.config = dependencies.config;
    this.users = dependencies.users;
    this.revocationList = dependencies.revocationList;
    this.clock = dependencies.clock ?? systemClock;
    this.key = new TextEncoder().encode(this.config.secret);
  }

  async verify(token: string, expectedType: TokenType): Promise<VerifiedToken<TUser>> {
    const claims = await this.parse(token);

    if (claims.token_type !== expectedType) {
      throw new WrongTokenTypeError();
    }

    // exp == now counts as expired
    if (toEpochSeconds(this.clock()) >= claims.exp) {
      throw new TokenExpiredError();
    }

    if (this.revocationList && (await this.revocationList.isRevoked(claims.jti))) {
      throw new TokenRevokedError();
    }

    const user = await this.users.findById(Number(claims.sub));
    if (!user) {
      throw new TokenUserNotFoundError();
    }
    if (!user.isActive) {
      throw new InactiveUserError();
    }

    return { user, claims };
  }

  private async parse(token: string): Promise<TokenClaims> {
    let payload: Uint8Array;
    try {
      ({ payload } = await compactVerify(token, this.key, {
        algorithms: [this.config.algorithm],
      }));
    } catch (error) {
      throw new InvalidTokenError('Could not validate credentials', { cause: error });
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(new TextDecoder().decode(payload));
    } catch (error) {
      throw new InvalidTokenError('Token payload is not valid JSON', { cause: error });
    }

    const parsed = TokenClaimsSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new InvalidTokenError('Token claims are malformed', { cause: parsed.error });
    }
    if (parsed.data.iss !== this.config.issuer) {
      throw new InvalidTokenError('Token issuer is not trusted');
    }

    return parsed.data;
  }
}
