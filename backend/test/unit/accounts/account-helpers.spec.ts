import { describe, it, expect } from 'vitest';
import {
  buildActivationLink,
  buildLoginLink,
  buildPasswordResetLink,
} from '../../../src/modules/accounts/helpers/account-links';
import { emailIdentity } from '../../../src/modules/accounts/helpers/email-identity';
import { toAccountSummary } from '../../../src/modules/accounts/helpers/account-summary';
import { Sha256TokenHasher } from '../../../src/shared/security/token-hasher';

describe('account links', () => {
  it('query-encodes email and token under the public app url', () => {
    expect(buildActivationLink('http://app.test/', 'a+b@example.com', 'tok')).toBe(
      'http://app.test/activate?email=a%2Bb%40example.com&token=tok',
    );
    expect(buildPasswordResetLink('http://app.test', 'u@example.com', 'x_y-z')).toBe(
      'http://app.test/reset-password?email=u%40example.com&token=x_y-z',
    );
    expect(buildLoginLink('http://app.test//')).toBe('http://app.test/login');
  });
});

describe('emailIdentity', () => {
  it('normalizes the email and derives a hashed key plus the domain', () => {
    const hasher = new Sha256TokenHasher();
    const identity = emailIdentity(hasher, '  Someone@Example.COM ');

    expect(identity.email).toBe('someone@example.com');
    expect(identity.emailDomain).toBe('example.com');
    expect(identity.emailKey).toBe(hasher.hash('someone@example.com'));
  });
});

describe('toAccountSummary', () => {
  it('maps a user to the snake_case wire shape', () => {
    const createdAt = new Date('2026-02-03T04:05:06.007Z');

    expect(
      toAccountSummary({
        id: 12,
        email: 'u@example.com',
        isActive: true,
        group: 'moderator',
        createdAt,
        updatedAt: createdAt,
      }),
    ).toEqual({
      id: 12,
      email: 'u@example.com',
      is_active: true,
      group: 'moderator',
      created_at: '2026-02-03T04:05:06.007Z',
    });
  });
});
