/**
 * User Service
 *
 * Business logic layer for user operations.
 * Implements registration and profile management.
 */

import { type AuthEventSink, hashPassword } from '@taskhub/auth';
import { UniqueConstraintError } from '@taskhub/database';
import { definedOnly, hasChanges } from '../patch.js';
import type { UserRepository } from './user-repository.js';
import { DuplicateEmailError, DuplicateUsernameError, UserNotFoundError } from './user-errors.js';
import type { RegisterUserParams, UpdateProfileParams, User, UpdateUserData } from './user-types.js';

const USERNAME_CONSTRAINT = 'users_username_unique';

export class UserService {
  constructor(
    private userRepo: UserRepository,
    private authEvents: AuthEventSink
  ) {}

  /**
   * Register a new user
   *
   * Business rules:
   * - Email is stored trimmed and lowercase, and must be unique
   * - Username must be unique
   * - Only the password hash is stored
   * - Emits user.registered event for audit logging
   */
  async registerUser(params: RegisterUserParams): Promise<User> {
    const email = this.normalizeEmail(params.email);
    const username = params.username.trim();

    if (await this.userRepo.findByEmail(email)) {
      throw new DuplicateEmailError(email);
    }
    if (await this.userRepo.findByUsername(username)) {
      throw new DuplicateUsernameError(username);
    }

    const passwordHash = await hashPassword(params.password);

    let user: User;
    try {
      user = await this.userRepo.create({
        username,
        email,
        firstName: params.firstName ?? null,
        lastName: params.lastName ?? null,
        passwordHash,
      });
    } catch (error) {
      // Lost a race with a concurrent registration
      if (error instanceof UniqueConstraintError) {
        throw error.constraint === USERNAME_CONSTRAINT
          ? new DuplicateUsernameError(username, { cause: error })
          : new DuplicateEmailError(email, { cause: error });
      }
      throw error;
    }

    this.authEvents.emit({
      type: 'user.registered',
      userId: user.id,
      email: user.email,
      ...(params.ip ? { ip: params.ip } : {}),
    });

    return user;
  }

  async getProfile(userId: number): Promise<User> {
    const user = await this.userRepo.findById(userId);
    if (!user) {
      throw new UserNotFoundError(userId);
    }
    return user;
  }

  /**
   * Update email and names. An empty patch returns the user unchanged.
   */
  async updateProfile(user: User, params: UpdateProfileParams): Promise<User> {
    const patch: UpdateUserData = definedOnly({
      email: params.email === undefined ? undefined : this.normalizeEmail(params.email),
      firstName: params.firstName,
      lastName: params.lastName,
    });

    if (!hasChanges(patch)) {
      return user;
    }

    if (patch.email !== undefined && patch.email !== user.email) {
      const existing = await this.userRepo.findByEmail(patch.email);
      if (existing && existing.id !== user.id) {
        throw new DuplicateEmailError(patch.email);
      }
    }

    let updated: User | null;
    try {
      updated = await this.userRepo.update(user.id, patch);
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        throw new DuplicateEmailError(patch.email ?? user.email, { cause: error });
      }
      throw error;
    }

    if (!updated) {
      throw new UserNotFoundError(user.id);
    }
    return updated;
  }

  /**
   * Normalize email to lowercase and trim whitespace
   */
  private normalizeEmail(email: string): string {
    return email.toLowerCase().trim();
  }
}
