/**
 * Users Domain
 *
 * Exports for user management functionality
 */

export { DrizzleUserRepository } from './user-repository.js';
export type { UserRepository } from './user-repository.js';

export { UserService } from './user-service.js';
export type {
  CreateUserData,
  RegisterUserParams,
  UpdateProfileParams,
  UpdateUserData,
  User,
} from './user-types.js';

export { DuplicateEmailError, DuplicateUsernameError, UserNotFoundError } from './user-errors.js';
