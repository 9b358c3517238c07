import { describe, it, expect } from 'vitest';
import { roleAtLeast } from '../../../src/modules/users/policies/role.policy';
import { isUserGroup } from '../../../src/modules/users/user.types';

describe('roleAtLeast', () => {
  it('orders groups user < moderator < admin', () => {
    expect(roleAtLeast('admin', 'moderator')).toBe(true);
    expect(roleAtLeast('moderator', 'moderator')).toBe(true);
    expect(roleAtLeast('user', 'moderator')).toBe(false);
    expect(roleAtLeast('moderator', 'admin')).toBe(false);
    expect(roleAtLeast('user', 'user')).toBe(true);
  });
});

describe('isUserGroup', () => {
  it('accepts only the known lowercase names', () => {
    expect(isUserGroup('moderator')).toBe(true);
    expect(isUserGroup('Moderator')).toBe(false);
    expect(isUserGroup('superuser')).toBe(false);
  });
});
