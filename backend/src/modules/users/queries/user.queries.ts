/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Read-only, side-effect free.
 * - Shapes rows into User domain types (group name narrowed to UserGroup).
 *
 * RULES:
 * - No AppError.
 * - getUserWithPasswordBy* is for credential checks only.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectUserByEmailSql,
  selectUserByIdSql,
  selectUserGroupByNameSql,
} from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import { isUserGroup } from '../user.types';
import type { User, UserGroup, UserGroupRecord, UserWithPassword } from '../user.types';

function toUserGroup(name: string): UserGroup {
  if (!isUserGroup(name)) {
    // user_groups is seeded by migration; an unknown name means schema drift.
    throw new Error(`Unknown user group in database: ${name}`);
  }
  return name;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    isActive: row.is_active,
    group: toUserGroup(row.group_name),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toUserWithPassword(row: UserRow): UserWithPassword {
  return { ...toUser(row), hashedPassword: row.hashed_password };
}

export async function getUserByEmail(db: DbExecutor, email: string): Promise<User | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserById(db: DbExecutor, userId: number): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserWithPasswordByEmail(
  db: DbExecutor,
  email: string,
): Promise<UserWithPassword | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return toUserWithPassword(row);
}

export async function getUserWithPasswordById(
  db: DbExecutor,
  userId: number,
): Promise<UserWithPassword | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUserWithPassword(row);
}

export async function getUserGroupByName(
  db: DbExecutor,
  name: UserGroup,
): Promise<UserGroupRecord | undefined> {
  const row = await selectUserGroupByNameSql(db, name);
  if (!row) return undefined;
  return { id: row.id, name: toUserGroup(row.name) };
}
