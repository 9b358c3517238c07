import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { AppError } from '../../../../src/shared/http/errors';
import type { AuthContext } from '../../../../src/shared/http/auth-context';
import {
  requireAdmin,
  requireModerator,
  requireUser,
} from '../../../../src/shared/http/require-user';

function makeReq(authContext: AuthContext): FastifyRequest {
  return { authContext } as unknown as FastifyRequest;
}

function userCtx(group: 'user' | 'moderator' | 'admin'): AuthContext {
  return {
    user: { userId: 1, email: 'u@example.com', group, isActive: true },
    failure: null,
  };
}

function captureAppError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected an AppError');
}

describe('requireUser', () => {
  it('401 "Not authenticated." when no credentials were sent', () => {
    const err = captureAppError(() => requireUser(makeReq({ user: null, failure: null })));

    expect(err.status).toBe(401);
    expect(err.message).toBe('Not authenticated.');
  });

  it('401 "Not authenticated." for a malformed Authorization header', () => {
    const err = captureAppError(() => requireUser(makeReq({ user: null, failure: 'malformed' })));

    expect(err.status).toBe(401);
    expect(err.message).toBe('Not authenticated.');
  });

  it.each(['expired', 'invalid', 'user_not_found'] as const)(
    '401 "Invalid token." when the bearer token failed as %s',
    (failure) => {
      const err = captureAppError(() => requireUser(makeReq({ user: null, failure })));

      expect(err.status).toBe(401);
      expect(err.message).toBe('Invalid token.');
    },
  );

  it('returns the authenticated user', () => {
    const user = requireUser(makeReq(userCtx('user')));

    expect(user).toEqual({ userId: 1, email: 'u@example.com', group: 'user', isActive: true });
  });
});

describe('group guards', () => {
  it('requireModerator rejects a plain user with 403', () => {
    const err = captureAppError(() => requireModerator(makeReq(userCtx('user'))));

    expect(err.status).toBe(403);
    expect(err.message).toBe('Moderator privileges required.');
  });

  it('requireModerator lets moderators and admins through', () => {
    expect(requireModerator(makeReq(userCtx('moderator'))).group).toBe('moderator');
    expect(requireModerator(makeReq(userCtx('admin'))).group).toBe('admin');
  });

  it('requireAdmin rejects a moderator with 403', () => {
    const err = captureAppError(() => requireAdmin(makeReq(userCtx('moderator'))));

    expect(err.status).toBe(403);
    expect(err.code).toBe('FORBIDDEN');
    expect(err.message).toBe('Admin privileges required.');
  });

  it('authentication is checked before privileges', () => {
    const err = captureAppError(() => requireAdmin(makeReq({ user: null, failure: 'expired' })));

    expect(err.status).toBe(401);
  });
});
