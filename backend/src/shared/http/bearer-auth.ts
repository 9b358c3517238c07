/**
 * backend/src/shared/http/bearer-auth.ts
 *
 * WHY:
 * - Resolves `Authorization: Bearer <access_token>` into req.authContext once per request.
 * - Never throws: endpoints decide whether authentication is required (requireUser).
 *
 * OUTCOMES:
 * - no header                     -> anonymous
 * - not "Bearer <token>"          -> failure 'malformed'
 * - token expired                 -> failure 'expired'
 * - bad signature / claims        -> failure 'invalid'
 * - user id no longer exists      -> failure 'user_not_found'
 * - user lookup rejects (DB down)  -> failure 'invalid' (logged)
 * - otherwise                     -> user { userId, email, group, isActive }
 *
 * RULES:
 * - Runs AFTER registerRequestContext and registerAuthContext.
 * - Only the access-token secret is accepted here; refresh tokens fail as 'invalid'.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import type { JwtTokenManager } from '../security/jwt-token-manager';
import { TokenExpiredError } from '../security/token-errors';
import type { AuthenticatedUser, AuthFailure } from './auth-context';
import type { User } from '../../modules/users/user.types';
import { errorFields } from '../logger/logger';
import { withRequestContext } from '../logger/with-context';

export type BearerAuthDeps = {
  tokenManager: JwtTokenManager;
  findUserById: (userId: number) => Promise<User | undefined>;
};

const BEARER_PREFIX = 'bearer ';

/** Returns the token, null when there is no header, or '' when the header is malformed. */
export function extractBearerToken(header: string | undefined): string | null {
  if (header === undefined) return null;

  const trimmed = header.trim();
  if (trimmed.slice(0, BEARER_PREFIX.length).toLowerCase() !== BEARER_PREFIX) return '';

  return trimmed.slice(BEARER_PREFIX.length).trim();
}

async function resolveUser(
  deps: BearerAuthDeps,
  token: string,
): Promise<{ user: AuthenticatedUser } | { failure: AuthFailure }> {
  let userId: number;
  try {
    ({ userId } = deps.tokenManager.decodeAccessToken(token));
  } catch (err: unknown) {
    return { failure: err instanceof TokenExpiredError ? 'expired' : 'invalid' };
  }

  const user = await deps.findUserById(userId);
  if (!user) return { failure: 'user_not_found' };

  return {
    user: { userId: user.id, email: user.email, group: user.group, isActive: user.isActive },
  };
}

export function registerBearerAuth(app: FastifyInstance, deps: BearerAuthDeps): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const token = extractBearerToken(req.headers.authorization);
    if (token === null) return;

    if (token === '') {
      req.authContext = { user: null, failure: 'malformed' };
      return;
    }

    let resolved: Awaited<ReturnType<typeof resolveUser>>;
    try {
      resolved = await resolveUser(deps, token);
    } catch (err: unknown) {
      withRequestContext(req).error('auth.bearer.user_lookup_failed', {
        flow: 'http.bearer-auth',
        ...errorFields(err),
      });
      req.authContext = { user: null, failure: 'invalid' };
      return;
    }

    if ('failure' in resolved) {
      req.authContext = { user: null, failure: resolved.failure };
      withRequestContext(req).debug('auth.bearer.rejected', {
        flow: 'http.bearer-auth',
        failure: resolved.failure,
      });
      return;
    }

    req.authContext = { user: resolved.user, failure: null };
  });
}
