/**
 * src/modules/accounts/account.schemas.ts
 *
 * WHY:
 * - Request validation for every accounts endpoint.
 *
 * RULES:
 * - Zod only. Controllers use safeParse and answer 400 with the first issue's message.
 * - New passwords go through strongPasswordSchema; login only requires a non-empty one.
 * - Emails are trimmed and lowercased here; flows still lowercase defensively.
 * - Tokens are only checked for presence; correctness is decided by hash lookup.
 */

import { z } from 'zod';

import { strongPasswordSchema } from '../../shared/security/password-policy';
const emailSchema = z
  .string({ required_error: 'Email is required.' })
  .trim()
  .toLowerCase()
  .max(255, 'Email must be at most 255 characters.')
  .email('Enter a valid email address.');

const rawTokenSchema = z.string({ required_error: 'Token is required.' }).min(1, 'Token is required.');

export const registerSchema = z.object({
  email: emailSchema,
  password: strongPasswordSchema,
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const activateSchema = z.object({
  email: emailSchema,
  token: rawTokenSchema,
});

export type ActivateInput = z.infer<typeof activateSchema>;

export const emailOnlySchema = z.object({
  email: emailSchema,
});

export type EmailOnlyInput = z.infer<typeof emailOnlySchema>;

export const resetPasswordCompleteSchema = z.object({
  email: emailSchema,
  token: rawTokenSchema,
  password: strongPasswordSchema,
});

export type ResetPasswordCompleteInput = z.infer<typeof resetPasswordCompleteSchema>;

export const loginSchema = z.object({
  email: emailSchema,
  password: z.string({ required_error: 'Password is required.' }).min(1, 'Password is required.'),
});

export type LoginInput = z.infer<typeof loginSchema>;

export const refreshTokenSchema = z.object({
  refresh_token: z
    .string({ required_error: 'Refresh token is required.' })
    .min(1, 'Refresh token is required.'),
});

export type RefreshTokenInput = z.infer<typeof refreshTokenSchema>;

export const changePasswordSchema = z.object({
  old_password: z
    .string({ required_error: 'Old password is required.' })
    .min(1, 'Old password is required.'),
  new_password: strongPasswordSchema,
});

export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;

// users.id is a Postgres serial (int4)
const MAX_USER_ID = 2_147_483_647;

export const userIdParamsSchema = z.object({
  userId: z.coerce
    .number({ invalid_type_error: 'User id must be a positive integer.' })
    .int('User id must be a positive integer.')
    .positive('User id must be a positive integer.')
    .max(MAX_USER_ID, 'User id must be a positive integer.'),
});

export type UserIdParams = z.infer<typeof userIdParamsSchema>;

/**
 * Any string is accepted so an unknown group answers 404 "Group not found."
 * rather than a validation error.
 */
export const changeGroupSchema = z.object({
  group: z.string({ required_error: 'Group is required.' }).trim().min(1, 'Group is required.'),
});

export type ChangeGroupInput = z.infer<typeof changeGroupSchema>;
