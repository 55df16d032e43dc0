export type AuthErrorCode =
  | 'unauthorized'
  | 'invalid_token'
  | 'wrong_token_type'
  | 'token_expired'
  | 'token_revoked'
  | 'user_not_found'
  | 'inactive_user'
  | 'invalid_credentials'
  | 'incorrect_password';

export class AuthCoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Terminal authentication failure. `code` is the machine-readable reason
 * surfaced to clients.
 */
export class UnauthorizedError extends AuthCoreError {
  readonly code: AuthErrorCode = 'unauthorized';

  constructor(message = 'Could not validate credentials', options?: ErrorOptions) {
    super(message, options);
  }
}

export class InvalidTokenError extends UnauthorizedError {
  override readonly code = 'invalid_token';
}

export class WrongTokenTypeError extends UnauthorizedError {
  override readonly code = 'wrong_token_type';

  constructor(message = 'Invalid token type', options?: ErrorOptions) {
    super(message, options);
  }
}

export class TokenExpiredError extends UnauthorizedError {
  override readonly code = 'token_expired';

  constructor(message = 'Token has expired', options?: ErrorOptions) {
    super(message, options);
  }
}

export class TokenRevokedError extends UnauthorizedError {
  override readonly code = 'token_revoked';

  constructor(message = 'Token has been revoked', options?: ErrorOptions) {
    super(message, options);
  }
}

export class TokenUserNotFoundError extends UnauthorizedError {
  override readonly code = 'user_not_found';

  constructor(message = 'User not found', options?: ErrorOptions) {
    super(message, options);
  }
}

export class InactiveUserError extends UnauthorizedError {
  override readonly code = 'inactive_user';

  constructor(message = 'User account is inactive', options?: ErrorOptions) {
    super(message, options);
  }
}

export class InvalidCredentialsError extends UnauthorizedError {
  override readonly code = 'invalid_credentials';

  constructor(message = 'Incorrect email or password', options?: ErrorOptions) {
    super(message, options);
  }
}

export class IncorrectPasswordError extends UnauthorizedError {
  override readonly code = 'incorrect_password';

  constructor(message = 'Current password is incorrect', options?: ErrorOptions) {
    super(message, options);
  }
}
