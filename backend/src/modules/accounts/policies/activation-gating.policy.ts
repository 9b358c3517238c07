/**
 * WHY:
 * - Activation outcome rules, pure and unit-testable.
 *
 * RULES (in order):
 * - no token row for (email, token)  -> 400 invalid or expired
 * - token expired                    -> 400 invalid or expired; caller deletes the row
 * - owner already active             -> 400 already active
 */

import { AccountErrors } from '../account.errors';
import { isTokenExpired } from './token-expiry.policy';

export type ActivationCandidate = Readonly<{
  id: number;
  expiresAt: Date;
  userIsActive: boolean;
}>;

export type ActivationFailure = {
  reason: 'token_not_found' | 'token_expired' | 'already_active';
  error: Error;
  /** Row to delete as a side effect, when the token is stale. */
  staleTokenId: number | null;
};

export function getActivationFailure(
  match: ActivationCandidate | null | undefined,
  now: Date,
): ActivationFailure | null {
  if (!match) {
    return {
      reason: 'token_not_found',
      error: AccountErrors.activationTokenInvalid(),
      staleTokenId: null,
    };
  }

  if (isTokenExpired(match.expiresAt, now)) {
    return {
      reason: 'token_expired',
      error: AccountErrors.activationTokenInvalid(),
      staleTokenId: match.id,
    };
  }

  if (match.userIsActive) {
    return { reason: 'already_active', error: AccountErrors.alreadyActive(), staleTokenId: null };
  }

  return null;
}

export function assertActivationAllowed(
  match: ActivationCandidate | null | undefined,
  now: Date,
): asserts match is ActivationCandidate {
  const failure = getActivationFailure(match, now);
  if (failure) throw failure.error;
}
