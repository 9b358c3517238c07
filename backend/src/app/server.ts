/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global hooks + the error handler.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1. request context (requestId, ip, user agent)
 * 2. anonymous auth context
 * 3. bearer auth (resolves Authorization header)
 * 4. request log line
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerBearerAuth } from '../shared/http/bearer-auth';
import { registerErrorHandler } from '../shared/http/error-handler';
import { withRequestContext } from '../shared/logger/with-context';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // winston is the only logger
    ignoreTrailingSlash: true,
    trustProxy: opts.config.nodeEnv === 'production',
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerBearerAuth(app, {
    tokenManager: opts.deps.tokenManager,
    findUserById: opts.deps.users.findById,
  });

  registerErrorHandler(app);

  app.addHook('onRequest', async (req) => {
    withRequestContext(req).info('request', {
      method: req.method,
      url: req.url,
    });
  });

  return app;
}
