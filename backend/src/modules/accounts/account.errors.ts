/**
 * src/modules/accounts/account.errors.ts
 *
 * WHY:
 * - The accounts module owns its user-facing error messages.
 *
 * RULES:
 * - AppError is the transport primitive.
 * - Never put passwords, tokens or hashes in meta.
 * - Login never says which of email/password was wrong.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AccountErrors = {
  emailTaken(email: string, meta?: AppErrorMeta) {
    return AppError.conflict(`A user with this email ${email} already exists.`, meta);
  },

  defaultGroupMissing(meta?: AppErrorMeta) {
    return AppError.internal('Default user group not found.', meta);
  },

  userCreationFailed(meta?: AppErrorMeta) {
    return AppError.internal('An error occurred during user creation.', meta);
  },

  activationTokenInvalid(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid or expired activation token.', meta);
  },

  alreadyActive(meta?: AppErrorMeta) {
    return AppError.validationError('User account is already active.', meta);
  },

  /** Reset completion: unknown user, inactive user, missing/mismatched/expired token. */
  resetTokenInvalid(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid email or token.', meta);
  },

  passwordResetFailed(meta?: AppErrorMeta) {
    return AppError.internal('An error occurred while resetting the password.', meta);
  },

  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid email or password.', meta);
  },

  notActivated(meta?: AppErrorMeta) {
    return AppError.forbidden('User account is not activated.', meta);
  },

  loginFailed(meta?: AppErrorMeta) {
    return AppError.internal('An error occurred while processing the request.', meta);
  },

  /** Refresh: decoder message is passed through ("Token has expired." / "Invalid token."). */
  refreshTokenUndecodable(message: string, meta?: AppErrorMeta) {
    return AppError.validationError(message, meta);
  },

  refreshTokenNotFound(meta?: AppErrorMeta) {
    return AppError.unauthorized('Refresh token not found.', meta);
  },

  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found.', meta);
  },

  groupNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Group not found.', meta);
  },

  logoutTokenInvalid(meta?: AppErrorMeta) {
    return AppError.validationError('Failed to logout. Invalid or expired token.', meta);
  },

  oldPasswordIncorrect(meta?: AppErrorMeta) {
    return AppError.validationError('Old password is incorrect.', meta);
  },
} as const;
