/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication (who is calling) is resolved once per request by the bearer hook.
 * - Authorization (may they call this) is decided later by requireUser() in controllers.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an anonymous context on every request.
 * 2. registerBearerAuth() overwrites it when an Authorization header is present,
 *    either with the resolved user or with the reason resolution failed.
 * 3. Controllers call requireUser(req) / requireAdmin(req) / requireModerator(req).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { UserGroup } from '../../modules/users/user.types';

export type AuthFailure = 'malformed' | 'expired' | 'invalid' | 'user_not_found';

export type AuthenticatedUser = {
  userId: number;
  email: string;
  group: UserGroup;
  isActive: boolean;
};

export type AuthContext = {
  user: AuthenticatedUser | null;
  failure: AuthFailure | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function anonymousAuthContext(): AuthContext {
  return { user: null, failure: null };
}

export function registerAuthContext(app: FastifyInstance) {
  // Real value is assigned per request in the hook below.
  app.decorateRequest('authContext', null as unknown as AuthContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = anonymousAuthContext();
    done();
  });
}
