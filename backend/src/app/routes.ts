/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes: /health plus module routes.
 *
 * RULES:
 * - No business logic here. Only wiring.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  // Platform checks + e2e smoke
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      requestId: req.requestContext.requestId,
    };
  });

  // Module routes
  opts.deps.accounts.registerRoutes(app);
}
