import { z } from 'zod';

export const TOKEN_TYPES = ['access', 'refresh'] as const;
export type TokenType = (typeof TOKEN_TYPES)[number];

// Largest value of a Postgres integer id
export const MAX_SUBJECT_ID = 2_147_483_647;

export const TokenClaimsSchema = z.object({
  sub: z
    .string()
    .regex(/^[1-9]\d{0,9}$/, 'sub must be a user id')
    .refine((value) => Number(value) <= MAX_SUBJECT_ID, 'sub must be a user id'),
  token_type: z.enum(TOKEN_TYPES),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
  iss: z.string().min(1),
});

export type TokenClaims = z.infer<typeof TokenClaimsSchema>;

export type IssuedToken = {
  token: string;
  claims: TokenClaims;
};

export type TokenPair = {
  accessToken: string;
  refreshToken: string;
};

/**
 * The slice of a user the auth core needs. Domain user types satisfy it structurally.
 */
export type AuthUserRecord = {
  id: number;
  email: string;
  passwordHash: string;
  isActive: boolean;
};

export type VerifiedToken<TUser extends AuthUserRecord> = {
  user: TUser;
  claims: TokenClaims;
};

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
