/**
 * WHY:
 * - Password reset completion rules, pure and unit-testable.
 *
 * RULES (in order, all answer the same 400 "Invalid email or token."):
 * - unknown user / inactive user
 * - no reset token for that user
 * - presented token does not match   -> stored row is deleted
 * - token expired                    -> stored row is deleted
 *
 * One message for every case: the response never says which check failed.
 */

import { tokenHashesMatch } from '../../../shared/security/token-hasher';
import { AccountErrors } from '../account.errors';
import { isTokenExpired } from './token-expiry.policy';

export type ResetUserCandidate = Readonly<{ isActive: boolean }>;

export type ResetTokenCandidate = Readonly<{
  userId: number;
  tokenHash: string;
  expiresAt: Date;
}>;

export type ResetTokenFailureReason =
  | 'user_not_found'
  | 'user_inactive'
  | 'token_not_found'
  | 'token_mismatch'
  | 'token_expired';

export type ResetTokenFailure = {
  reason: ResetTokenFailureReason;
  error: Error;
  /** True when the stored row must be deleted as a side effect. */
  deleteStoredToken: boolean;
};

function fail(reason: ResetTokenFailureReason, deleteStoredToken = false): ResetTokenFailure {
  return { reason, error: AccountErrors.resetTokenInvalid(), deleteStoredToken };
}

export function getResetTokenFailure(input: {
  user: ResetUserCandidate | null | undefined;
  storedToken: ResetTokenCandidate | null | undefined;
  presentedTokenHash: string;
  now: Date;
}): ResetTokenFailure | null {
  if (!input.user) return fail('user_not_found');
  if (!input.user.isActive) return fail('user_inactive');
  if (!input.storedToken) return fail('token_not_found');

  if (!tokenHashesMatch(input.storedToken.tokenHash, input.presentedTokenHash)) {
    return fail('token_mismatch', true);
  }

  if (isTokenExpired(input.storedToken.expiresAt, input.now)) {
    return fail('token_expired', true);
  }

  return null;
}
