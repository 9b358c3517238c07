import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { JwtTokenManager } from '../../../../src/shared/security/jwt-token-manager';
import type { JwtTokenManagerOptions } from '../../../../src/shared/security/jwt-token-manager';
import { InvalidTokenError, TokenExpiredError } from '../../../../src/shared/security/token-errors';

const T0 = new Date('2026-01-01T00:00:00.000Z');

function makeManager(overrides: Partial<JwtTokenManagerOptions> = {}) {
  let nowMs = T0.getTime();

  const manager = new JwtTokenManager({
    accessSecret: 'test-access-secret-0001',
    refreshSecret: 'test-refresh-secret-0001',
    algorithm: 'HS256',
    accessTtlMinutes: 15,
    refreshTtlDays: 7,
    now: () => new Date(nowMs),
    ...overrides,
  });

  return {
    manager,
    advance(ms: number) {
      nowMs += ms;
    },
  };
}

describe('JwtTokenManager', () => {
  it('round-trips the user id and sets exp from the access TTL', () => {
    const { manager } = makeManager();

    const decoded = manager.decodeAccessToken(manager.createAccessToken({ userId: 42 }));

    expect(decoded.userId).toBe(42);
    expect(decoded.expiresAt.toISOString()).toBe('2026-01-01T00:15:00.000Z');
  });

  it('refresh tokens expire after refreshTtlDays', () => {
    const { manager } = makeManager();

    const decoded = manager.decodeRefreshToken(manager.createRefreshToken({ userId: 7 }));

    expect(decoded.userId).toBe(7);
    expect(decoded.expiresAt.toISOString()).toBe('2026-01-08T00:00:00.000Z');
    expect(manager.refreshTtlSeconds).toBe(7 * 24 * 60 * 60);
    expect(manager.accessTtlSeconds).toBe(15 * 60);
  });

  it('two refresh tokens for the same user in the same second differ', () => {
    const { manager } = makeManager();

    const a = manager.createRefreshToken({ userId: 1 });
    const b = manager.createRefreshToken({ userId: 1 });

    expect(a).not.toBe(b);
  });

  it('an access token is expired at its exp instant', () => {
    const { manager, advance } = makeManager();
    const token = manager.createAccessToken({ userId: 1 });

    advance(15 * 60 * 1000 - 1000);
    expect(manager.decodeAccessToken(token).userId).toBe(1);

    advance(1000);
    expect(() => manager.decodeAccessToken(token)).toThrowError(TokenExpiredError);
    expect(() => manager.decodeAccessToken(token)).toThrowError('Token has expired.');
  });

  it('does not accept a refresh token as an access token (or the reverse)', () => {
    const { manager } = makeManager();

    expect(() => manager.decodeAccessToken(manager.createRefreshToken({ userId: 1 }))).toThrowError(
      InvalidTokenError,
    );
    expect(() => manager.decodeRefreshToken(manager.createAccessToken({ userId: 1 }))).toThrowError(
      InvalidTokenError,
    );
  });

  it('pins the signing algorithm on verify', () => {
    const { manager: hs256 } = makeManager();
    const { manager: hs512 } = makeManager({ algorithm: 'HS512' });

    const token = hs256.createAccessToken({ userId: 1 });

    expect(() => hs512.decodeAccessToken(token)).toThrowError(InvalidTokenError);
  });

  it('rejects garbage with "Invalid token."', () => {
    const { manager } = makeManager();

    expect(() => manager.decodeAccessToken('not-a-jwt')).toThrowError('Invalid token.');
  });

  it('rejects a correctly signed token without a user_id claim', () => {
    const { manager } = makeManager();
    const token = jwt.sign({ sub: 'someone' }, 'test-access-secret-0001', { algorithm: 'HS256' });

    try {
      manager.decodeAccessToken(token);
      expect.unreachable('decode should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidTokenError);
      if (err instanceof InvalidTokenError) {
        expect(err.reason).toBe('missing user_id claim');
      }
    }
  });
});
