/**
 * backend/src/modules/accounts/account.constants.ts
 *
 * WHY:
 * - Domain constants shared across account flows and the controller.
 *
 * RULES:
 * - No imports from DB/HTTP/framework code.
 */

export const ACCOUNT_RATE_LIMITS = {
  login: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
  register: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
  passwordResetRequest: {
    perEmail: { limit: 3, windowSeconds: 3600 }, // silent
  },
  passwordResetComplete: {
    perIp: { limit: 5, windowSeconds: 900 }, // hard 429
  },
} as const;

/**
 * Same answer whether or not the email belongs to an account
 * (resend activation, password reset request).
 */
export const GENERIC_EMAIL_SENT_MESSAGE =
  'If you are registered, you will receive an email with instructions.';

export const ACCOUNT_MESSAGES = {
  activated: 'User account activated successfully.',
  passwordReset: 'Password reset successfully.',
  loggedOut: 'Successfully logged out.',
  passwordChanged: 'Password changed successfully.',
  adminActivated: 'User activated successfully.',
  adminAlreadyActive: 'User is already active.',
  groupChanged: (group: string) => `User group changed to ${group}.`,
} as const;

export const TOKEN_TYPE = 'bearer' as const;
