import { describe, it, expect } from 'vitest';
import { getLoginFailure } from '../../../src/modules/accounts/policies/login-gating.policy';
import { AppError } from '../../../src/shared/http/errors';

describe('getLoginFailure', () => {
  it('unknown email -> 401 invalid credentials', () => {
    const res = getLoginFailure({ user: undefined, passwordValid: false });

    expect(res?.reason).toBe('user_not_found');
    expect(res?.error).toBeInstanceOf(AppError);
    expect(res?.error.message).toBe('Invalid email or password.');
  });

  it('wrong password gives the same message as an unknown email', () => {
    const res = getLoginFailure({ user: { isActive: true }, passwordValid: false });

    expect(res?.reason).toBe('wrong_password');
    expect(res?.error.message).toBe('Invalid email or password.');
  });

  it('checks the password before the active flag', () => {
    expect(getLoginFailure({ user: { isActive: false }, passwordValid: false })?.reason).toBe(
      'wrong_password',
    );
  });

  it('correct password on an inactive account -> 403 not activated', () => {
    const res = getLoginFailure({ user: { isActive: false }, passwordValid: true });

    expect(res?.reason).toBe('not_activated');
    expect(res?.error).toMatchObject({ status: 403, message: 'User account is not activated.' });
  });

  it('returns null for an active user with the right password', () => {
    expect(getLoginFailure({ user: { isActive: true }, passwordValid: true })).toBeNull();
  });
});
