/**
 * backend/src/shared/http/require-user.ts
 *
 * WHY:
 * - Controllers must not repeat "is the caller authenticated / privileged" logic.
 *
 * RULES:
 * - HTTP-only helper: reads req.authContext, never touches the DB.
 * - Throws AppError so the error handler maps it.
 *
 * Guard sequence:
 * 1) no or malformed Authorization header -> 401 "Not authenticated."
 * 2) expired / invalid token, user gone   -> 401 "Invalid token."
 * 3) group below the requirement          -> 403 "<Group> privileges required."
 */

import type { FastifyRequest } from 'fastify';

import { AppError } from './errors';
import type { AuthenticatedUser } from './auth-context';
import { roleAtLeast } from '../../modules/users/policies/role.policy';
import type { UserGroup } from '../../modules/users/user.types';

const PRIVILEGE_MESSAGES: Record<UserGroup, string> = {
  user: 'User privileges required.',
  moderator: 'Moderator privileges required.',
  admin: 'Admin privileges required.',
};

export type RequireUserOptions = Readonly<{
  group?: UserGroup;
}>;

export function requireUser(req: FastifyRequest, opts: RequireUserOptions = {}): AuthenticatedUser {
  const ctx = req.authContext;

  if (!ctx?.user) {
    if (!ctx?.failure || ctx.failure === 'malformed') {
      throw AppError.unauthorized('Not authenticated.');
    }
    throw AppError.unauthorized('Invalid token.', { failure: ctx.failure });
  }

  if (opts.group && !roleAtLeast(ctx.user.group, opts.group)) {
    throw AppError.forbidden(PRIVILEGE_MESSAGES[opts.group], {
      required: opts.group,
      actual: ctx.user.group,
    });
  }

  return ctx.user;
}

export function requireAdmin(req: FastifyRequest): AuthenticatedUser {
  return requireUser(req, { group: 'admin' });
}

export function requireModerator(req: FastifyRequest): AuthenticatedUser {
  return requireUser(req, { group: 'moderator' });
}
