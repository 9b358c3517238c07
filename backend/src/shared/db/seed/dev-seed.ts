/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates:
 * - an active admin account (if missing)
 *
 * Idempotent: safe to run on every start. An existing account with the seed
 * email is left untouched (its password is never overwritten).
 */

import type { DbExecutor } from '../db';
import type { PasswordHasher } from '../../security/password-hasher';
import type { UserRepo } from '../../../modules/users/dal/user.repo';
import { getUserByEmail, getUserGroupByName } from '../../../modules/users/queries/user.queries';
import { logger } from '../../logger/logger';

type DevSeedOptions = {
  adminEmail: string;
  adminPassword: string;
};

export type DevSeedResult = { userId: number; created: boolean };

export async function runDevSeed(opts: {
  db: DbExecutor;
  passwordHasher: PasswordHasher;
  userRepo: UserRepo;
  options: DevSeedOptions;
}): Promise<DevSeedResult> {
  const { db, passwordHasher, userRepo, options } = opts;

  const flow = 'seed.dev';
  const email = options.adminEmail.trim().toLowerCase();

  const existing = await getUserByEmail(db, email);
  if (existing) {
    logger.info('seed.admin.exists', {
      flow,
      userId: existing.id,
      group: existing.group,
      isActive: existing.isActive,
    });
    return { userId: existing.id, created: false };
  }

  const adminGroup = await getUserGroupByName(db, 'admin');
  if (!adminGroup) {
    throw new Error('Seed failed: user group "admin" is missing (run migrations first)');
  }

  const hashedPassword = await passwordHasher.hash(options.adminPassword);

  const userId = await db.transaction().execute(async (trx) => {
    const repo = userRepo.withDb(trx);
    const now = new Date();

    const created = await repo.insertUser({
      email,
      hashedPassword,
      groupId: adminGroup.id,
      now,
    });
    await repo.activate({ userId: created.id, now });

    return created.id;
  });

  logger.info('seed.admin.created', { flow, userId, group: 'admin' });

  return { userId, created: true };
}
