/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users and user groups.
 * - A user is always read together with its group name.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { DbExecutor } from '../../../shared/db/db';

function selectUserWithGroup(db: DbExecutor) {
  return db
    .selectFrom('users')
    .innerJoin('user_groups', 'user_groups.id', 'users.group_id')
    .select([
      'users.id',
      'users.email',
      'users.hashed_password',
      'users.is_active',
      'users.created_at',
      'users.updated_at',
      'user_groups.name as group_name',
    ]);
}

export type UserRow = {
  id: number;
  email: string;
  hashed_password: string;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
  group_name: string;
};

export async function selectUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return selectUserWithGroup(db).where('users.email', '=', email.toLowerCase()).executeTakeFirst();
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: number,
): Promise<UserRow | undefined> {
  return selectUserWithGroup(db).where('users.id', '=', userId).executeTakeFirst();
}

export async function selectUserGroupByNameSql(
  db: DbExecutor,
  name: string,
): Promise<{ id: number; name: string } | undefined> {
  return db
    .selectFrom('user_groups')
    .select(['id', 'name'])
    .where('name', '=', name)
    .executeTakeFirst();
}
