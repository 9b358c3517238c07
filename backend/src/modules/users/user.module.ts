/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Users is a support module without routes of its own.
 * - accounts consumes userRepo for writes; the bearer-auth hook consumes findById.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { DbExecutor } from '../../shared/db/db';
import { UserRepo } from './dal/user.repo';
import { getUserById } from './queries/user.queries';
import type { User } from './user.types';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { db: DbExecutor }) {
  const userRepo = new UserRepo(deps.db);

  return {
    userRepo,
    findById: (userId: number): Promise<User | undefined> => getUserById(deps.db, userId),
  };
}
