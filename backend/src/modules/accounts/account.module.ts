/**
 * src/modules/accounts/account.module.ts
 *
 * WHY:
 * - Encapsulates accounts module wiring: repo -> service -> controller -> routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';

import { AccountTokenRepo } from './dal/account-token.repo';
import { AccountService } from './account.service';
import { AccountController } from './account.controller';
import { registerAccountRoutes } from './account.routes';
import type { AccountFlowDeps } from './flows/flow-deps';

export type AccountModule = ReturnType<typeof createAccountModule>;

export function createAccountModule(deps: Omit<AccountFlowDeps, 'tokenRepo'>) {
  const tokenRepo = new AccountTokenRepo(deps.db);
  const accountService = new AccountService({ ...deps, tokenRepo });
  const controller = new AccountController(accountService);

  return {
    accountService,
    tokenRepo,
    registerRoutes(app: FastifyInstance) {
      registerAccountRoutes(app, controller);
    },
  };
}
