/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Assembles the runnable app: config -> deps -> server -> routes -> (dev seed).
 * - E2E tests build it, call app.inject, then close.
 *
 * RULES:
 * - Composition only; no request handlers or business logic here.
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import type { InfraOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, infra: InfraOverrides = {}) {
  const deps = await buildDeps(config, infra);
  const app = await buildServer({ config, deps });

  registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap
  if (config.seed.enabled) {
    const flow = 'seed.dev';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else {
      await runDevSeed({
        db: deps.db,
        passwordHasher: deps.passwordHasher,
        userRepo: deps.users.userRepo,
        options: {
          adminEmail: config.seed.adminEmail,
          adminPassword: config.seed.adminPassword,
        },
      });
    }
  }

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
