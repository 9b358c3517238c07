import { describe, it, expect } from 'vitest';
import {
  assertActivationAllowed,
  getActivationFailure,
} from '../../../src/modules/accounts/policies/activation-gating.policy';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const LATER = new Date('2026-03-02T12:00:00.000Z');

describe('getActivationFailure', () => {
  it('no matching token -> invalid or expired', () => {
    const res = getActivationFailure(undefined, NOW);

    expect(res?.reason).toBe('token_not_found');
    expect(res?.error.message).toBe('Invalid or expired activation token.');
    expect(res?.staleTokenId).toBeNull();
  });

  it('expired token -> same message, and the row is marked for deletion', () => {
    const res = getActivationFailure({ id: 9, expiresAt: NOW, userIsActive: false }, NOW);

    expect(res?.reason).toBe('token_expired');
    expect(res?.error.message).toBe('Invalid or expired activation token.');
    expect(res?.staleTokenId).toBe(9);
  });

  it('already active owner -> 400 already active', () => {
    const res = getActivationFailure({ id: 9, expiresAt: LATER, userIsActive: true }, NOW);

    expect(res?.reason).toBe('already_active');
    expect(res?.error).toMatchObject({ status: 400, message: 'User account is already active.' });
  });

  it('live token for an inactive user passes', () => {
    const match = { id: 9, expiresAt: LATER, userIsActive: false };

    expect(getActivationFailure(match, NOW)).toBeNull();
    expect(() => assertActivationAllowed(match, NOW)).not.toThrow();
  });
});
