import {
  type AuthEventSink,
  hashPassword as defaultHashPassword,
  verifyPassword as defaultVerifyPassword,
} from '@taskhub/auth';
import {
  InactiveUserError,
  IncorrectPasswordError,
  InvalidCredentialsError,
  UnauthorizedError,
} from './errors.js';
import type { AuthUserRepository } from './interfaces.js';
import type { TokenIssuer } from './token-issuer.js';
import type { TokenVerifier } from './token-verifier.js';
import type { AuthUserRecord, TokenPair, TokenType } from './types.js';

type SessionServiceDependencies<TUser extends AuthUserRecord> = {
  users: AuthUserRepository<TUser>;
  issuer: TokenIssuer;
  verifier: TokenVerifier<TUser>;
  events?: AuthEventSink;
  hashPassword?: (password: string) => Promise<string>;
  verifyPassword?: (password: string, hash: string) => Promise<boolean>;
};

// Hashed once per service and compared against when the email is unknown
const DUMMY_PASSWORD = 'absent-user-placeholder';

const noopEvents: AuthEventSink = {
  emit: () => undefined,
};

/**
 * Login, refresh, bearer authentication and password change on top of the
 * issuer and verifier.
 */
export class SessionService<TUser extends AuthUserRecord> {
  private readonly users: AuthUserRepository<TUser>;
  private readonly issuer: TokenIssuer;
  private readonly verifier: TokenVerifier<TUser>;
  private readonly events: AuthEventSink;
  private readonly hashPassword: (password: string) => Promise<string>;
  private readonly verifyPassword: (password: string, hash: string) => Promise<boolean>;
  private dummyHash: Promise<string> | undefined;

  constructor(dependencies: SessionServiceDependencies<TUser>) {
    this.users = dependencies.users;
    this.issuer = dependencies.issuer;
    this.verifier = dependencies.verifier;
    this.events = dependencies.events ?? noopEvents;
    this.hashPassword = dependencies.hashPassword ?? defaultHashPassword;
    this.verifyPassword = dependencies.verifyPassword ?? defaultVerifyPassword;
  }

  /**
   * Exchange credentials for an access/refresh token pair.
   * Unknown email and wrong password fail identically.
   */
  async login(email: string, password: string): Promise<TokenPair> {
    const normalizedEmail = email.trim().toLowerCase();
    const user = await this.users.findByEmail(normalizedEmail);

    // Unknown emails still pay for one hash verification
    const storedHash = user ? user.passwordHash : await this.absentUserHash();
    const valid = await this.verifyPassword(password, storedHash);
    if (!user || !valid) {
      this.events.emit({
        type: 'user.login.failed',
        email: normalizedEmail,
        metadata: { reason: 'invalid_credentials' },
      });
      throw new InvalidCredentialsError();
    }

    if (!user.isActive) {
      this.events.emit({
        type: 'user.login.failed',
        userId: user.id,
        email: normalizedEmail,
        metadata: { reason: 'inactive_user' },
      });
      throw new InactiveUserError();
    }

    const [access, refresh] = await Promise.all([
      this.issuer.issueAccessToken(user.id),
      this.issuer.issueRefreshToken(user.id),
    ]);

    this.events.emit({ type: 'user.login.success', userId: user.id, email: normalizedEmail });

    return { accessToken: access.token, refreshToken: refresh.token };
  }

  /**
   * Mint a new access token from a valid refresh token. The refresh token is not rotated.
   */
  async refresh(refreshToken: string): Promise<{ accessToken: string }> {
    const { user } = await this.verifyOrReport(refreshToken, 'refresh');
    const access = await this.issuer.issueAccessToken(user.id);

    this.events.emit({ type: 'token.refreshed', userId: user.id, metadata: { jti: access.claims.jti } });

    return { accessToken: access.token };
  }

  async authenticate(accessToken: string): Promise<TUser> {
    const { user } = await this.verifyOrReport(accessToken, 'access');
    return user;
  }

  /**
   * Replace the password hash after re-checking the current password.
   * Tokens issued before the change stay valid until they expire.
   */
  async changePassword(user: TUser, currentPassword: string, newPassword: string): Promise<void> {
    const valid = await this.verifyPassword(currentPassword, user.passwordHash);
    if (!valid) {
      throw new IncorrectPasswordError();
    }

    const passwordHash = await this.hashPassword(newPassword);
    await this.users.updatePasswordHash(user.id, passwordHash);

    this.events.emit({ type: 'user.password_changed', userId: user.id, email: user.email });
  }

  private absentUserHash(): Promise<string> {
    this.dummyHash ??= this.hashPassword(DUMMY_PASSWORD);
    return this.dummyHash;
  }

  private async verifyOrReport(token: string, tokenType: TokenType) {
    try {
      return await this.verifier.verify(token, tokenType);
    } catch (error) {
      if (error instanceof UnauthorizedError) {
        this.events.emit({
          type: 'token.auth_failed',
          metadata: { reason: error.code, tokenType },
        });
      }
      throw error;
    }
  }
}
