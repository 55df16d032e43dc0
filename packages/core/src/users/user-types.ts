/**
 * User Domain Types
 */

export interface User {
  id: number;
  username: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  passwordHash: string;
  isActive: boolean;
  isSuperuser: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface RegisterUserParams {
  username: string;
  email: string;
  password: string;
  firstName?: string | null;
  lastName?: string | null;
  ip?: string; // For audit logging
}

// Username is immutable after registration
export interface UpdateProfileParams {
  email?: string;
  firstName?: string | null;
  lastName?: string | null;
}

export interface CreateUserData {
  username: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  passwordHash: string;
}

export type UpdateUserData = Partial<Pick<User, 'email' | 'firstName' | 'lastName'>>;
