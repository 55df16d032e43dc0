import { z } from 'zod';

const passwordField = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .max(100, 'Password must be 100 characters or less');

const nameField = z.string().trim().min(1).max(50);

// Registration: unique username + email, optional names, password (8-100 chars)
export const RegisterSchema = z.object({
  username: z
    .string()
    .trim()
    .min(3, 'Username must be at least 3 characters')
    .max(50, 'Username must be 50 characters or less'),
  email: z.string().trim().email('Invalid email address').max(255),
  first_name: nameField.nullish(),
  last_name: nameField.nullish(),
  password: passwordField,
});

export type RegisterInput = z.infer<typeof RegisterSchema>;

export const LoginSchema = z.object({
  email: z.string().trim().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof LoginSchema>;

export const RefreshTokenSchema = z.object({
  refresh_token: z.string().min(1, 'refresh_token is required'),
});

export type RefreshTokenInput = z.infer<typeof RefreshTokenSchema>;

export const UpdateProfileSchema = z.object({
  email: z.string().trim().email('Invalid email address').max(255).optional(),
  first_name: nameField.nullish(),
  last_name: nameField.nullish(),
});

export type UpdateProfileInput = z.infer<typeof UpdateProfileSchema>;

export const ChangePasswordSchema = z.object({
  current_password: z.string().min(1, 'Current password is required'),
  new_password: passwordField,
});

export type ChangePasswordInput = z.infer<typeof ChangePasswordSchema>;
