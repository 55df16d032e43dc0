/**
 * User Domain Errors
 *
 * Custom error classes for user-related business rule violations.
 */

import { ConflictError, NotFoundError } from '../errors.js';

export class DuplicateEmailError extends ConflictError {
  constructor(email: string, options?: ErrorOptions) {
    super(`Email already registered: ${email}`, options);
  }
}

export class DuplicateUsernameError extends ConflictError {
  constructor(username: string, options?: ErrorOptions) {
    super(`Username already taken: ${username}`, options);
  }
}

export class UserNotFoundError extends NotFoundError {
  constructor(userId: number) {
    super(`User not found: ${userId}`);
  }
}
