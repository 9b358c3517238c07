import { describe, it, expect } from 'vitest';
import { Sha256TokenHasher, tokenHashesMatch } from '../../../../src/shared/security/token-hasher';
import { generateSecureToken } from '../../../../src/shared/security/token';

describe('Sha256TokenHasher', () => {
  const hasher = new Sha256TokenHasher();

  it('produces the hex SHA-256 digest', () => {
    expect(hasher.hash('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
  });

  it('is deterministic and never returns the raw value', () => {
    const raw = generateSecureToken();

    expect(hasher.hash(raw)).toBe(hasher.hash(raw));
    expect(hasher.hash(raw)).not.toBe(raw);
  });
});

describe('tokenHashesMatch', () => {
  it('compares digests', () => {
    expect(tokenHashesMatch('a1b2', 'a1b2')).toBe(true);
    expect(tokenHashesMatch('a1b2', 'a1b3')).toBe(false);
    expect(tokenHashesMatch('a1b2', 'a1b2c3')).toBe(false);
  });
});

describe('generateSecureToken', () => {
  it('returns 32 random bytes as unpadded base64url', () => {
    const token = generateSecureToken();

    expect(token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(generateSecureToken()).not.toBe(token);
  });
});
