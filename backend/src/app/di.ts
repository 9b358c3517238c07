/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them.
 *
 * RULES:
 * - No business logic, no HTTP logic.
 * - Environment-dependent decisions (e.g. rate limits off in test) belong HERE,
 *   not inside the classes themselves.
 * - Tests may pass ready-made infra (in-process Postgres, in-memory cache);
 *   whatever is passed in is still closed by deps.close().
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import { Sha256TokenHasher } from '../shared/security/token-hasher';
import type { TokenHasher } from '../shared/security/token-hasher';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import { JwtTokenManager } from '../shared/security/jwt-token-manager';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { AuditRepo } from '../shared/audit/audit.repo';

import { InMemQueue } from '../shared/messaging/inmem-queue';
import type { Queue } from '../shared/messaging/queue';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createAccountModule } from '../modules/accounts/account.module';
import type { AccountModule } from '../modules/accounts/account.module';

export type InfraOverrides = {
  db?: Db;
  cache?: Cache;
  queue?: Queue;
};

export type AppDeps = {
  db: Db;
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  tokenManager: JwtTokenManager;

  auditRepo: AuditRepo;

  // messaging
  queue: Queue;

  // modules
  users: UserModule;
  accounts: AccountModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(config: AppConfig, infra: InfraOverrides = {}): Promise<AppDeps> {
  const db = infra.db ?? createDb(config.databaseUrl);

  // Redis backs rate limiting in dev + prod
  const cache: Cache = infra.cache ?? (await RedisCache.connect(config.redisUrl));

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });

  const tokenManager = new JwtTokenManager({
    accessSecret: config.jwt.accessSecret,
    refreshSecret: config.jwt.refreshSecret,
    algorithm: config.jwt.algorithm,
    accessTtlMinutes: config.jwt.accessTtlMinutes,
    refreshTtlDays: config.jwt.refreshTtlDays,
  });

  // The composition root decides when rate limiting is off.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const auditRepo = new AuditRepo(db);

  // No mail transport is wired yet: messages stay in memory, capped (swap for a real adapter here).
  const queue: Queue = infra.queue ?? new InMemQueue({ maxMessages: 100 });

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ db });

  const accounts = createAccountModule({
    db,
    tokenHasher,
    passwordHasher,
    tokenManager,
    logger,
    rateLimiter,
    auditRepo,
    queue,
    userRepo: users.userRepo,
    settings: {
      activationTtlHours: config.tokens.activationTtlHours,
      passwordResetTtlHours: config.tokens.passwordResetTtlHours,
      publicAppUrl: config.publicAppUrl,
    },
  });

  return {
    db,
    cache,
    logger,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    tokenManager,
    auditRepo,
    queue,
    users,
    accounts,
    close: async () => {
      await cache.close();
      await db.destroy();
    },
  };
}
