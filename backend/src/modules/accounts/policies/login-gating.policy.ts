/**
 * WHY:
 * - Login outcome rules, pure and unit-testable.
 *
 * RULES (in order):
 * - unknown email              -> 401 invalid credentials
 * - wrong password             -> 401 invalid credentials (same message)
 * - correct password, inactive -> 403 not activated
 *
 * The password is checked before the active flag, so an inactive account only
 * reveals its state to someone who knows the password.
 */

import { AccountErrors } from '../account.errors';

export type LoginCandidate = Readonly<{
  isActive: boolean;
}>;

export type LoginFailureReason = 'user_not_found' | 'wrong_password' | 'not_activated';

export type LoginGatingFailure = {
  reason: LoginFailureReason;
  error: Error;
};

export function getLoginFailure(input: {
  user: LoginCandidate | null | undefined;
  passwordValid: boolean;
}): LoginGatingFailure | null {
  if (!input.user) {
    return { reason: 'user_not_found', error: AccountErrors.invalidCredentials() };
  }

  if (!input.passwordValid) {
    return { reason: 'wrong_password', error: AccountErrors.invalidCredentials() };
  }

  if (!input.user.isActive) {
    return { reason: 'not_activated', error: AccountErrors.notActivated() };
  }

  return null;
}
