import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Db } from '../../src/shared/db/db';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import { selectUserByEmailSql, selectUserByIdSql } from '../../src/modules/users/dal/user.query-sql';
import {
  getUserByEmail,
  getUserGroupByName,
  getUserWithPasswordById,
} from '../../src/modules/users/queries/user.queries';
import { createTestDb } from '../helpers/test-db';

const NOW = new Date('2026-04-01T10:00:00.000Z');

describe('users DAL', () => {
  let db: Db;
  let repo: UserRepo;
  let userGroupId: number;

  beforeEach(async () => {
    db = await createTestDb();
    repo = new UserRepo(db);

    const group = await getUserGroupByName(db, 'user');
    if (!group) throw new Error('user group missing after migrations');
    userGroupId = group.id;
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('migrations seed the three groups', async () => {
    const rows = await db.selectFrom('user_groups').select('name').orderBy('id').execute();

    expect(rows.map((r) => r.name)).toEqual(['user', 'moderator', 'admin']);
  });

  it('insertUser creates an inactive user that selectUserByEmail finds', async () => {
    const created = await repo.insertUser({
      email: 'alice@example.com',
      hashedPassword: 'hashed-value',
      groupId: userGroupId,
      now: NOW,
    });

    expect(created.email).toBe('alice@example.com');

    const row = await selectUserByEmailSql(db, 'alice@example.com');
    expect(row?.id).toBe(created.id);
    expect(row?.is_active).toBe(false);
    expect(row?.group_name).toBe('user');
    expect(row?.hashed_password).toBe('hashed-value');
  });

  it('normalizes email to lowercase on write and read', async () => {
    const created = await repo.insertUser({
      email: 'Bob@Example.COM',
      hashedPassword: 'h',
      groupId: userGroupId,
      now: NOW,
    });

    expect(created.email).toBe('bob@example.com');

    const row = await selectUserByEmailSql(db, 'BOB@EXAMPLE.COM');
    expect(row?.id).toBe(created.id);
  });

  it('rejects a second user with the same email', async () => {
    await repo.insertUser({ email: 'dup@example.com', hashedPassword: 'h', groupId: userGroupId, now: NOW });

    await expect(
      repo.insertUser({ email: 'DUP@example.com', hashedPassword: 'h', groupId: userGroupId, now: NOW }),
    ).rejects.toThrow();
  });

  it('getUserByEmail returns the shaped domain type without the password hash', async () => {
    const created = await repo.insertUser({
      email: 'diana@example.com',
      hashedPassword: 'h',
      groupId: userGroupId,
      now: NOW,
    });

    const user = await getUserByEmail(db, 'diana@example.com');

    expect(user).toEqual({
      id: created.id,
      email: 'diana@example.com',
      isActive: false,
      group: 'user',
      createdAt: NOW,
      updatedAt: NOW,
    });
  });

  it('activate, updatePassword and updateGroup change only their columns', async () => {
    const created = await repo.insertUser({
      email: 'eve@example.com',
      hashedPassword: 'old-hash',
      groupId: userGroupId,
      now: NOW,
    });
    const admin = await getUserGroupByName(db, 'admin');
    const later = new Date('2026-04-02T10:00:00.000Z');

    await repo.activate({ userId: created.id, now: later });
    await repo.updatePassword({ userId: created.id, hashedPassword: 'new-hash', now: later });
    await repo.updateGroup({ userId: created.id, groupId: admin?.id ?? -1, now: later });

    const user = await getUserWithPasswordById(db, created.id);
    expect(user?.isActive).toBe(true);
    expect(user?.hashedPassword).toBe('new-hash');
    expect(user?.group).toBe('admin');
    expect(user?.createdAt).toEqual(NOW);
    expect(user?.updatedAt).toEqual(later);
  });

  it('returns undefined for a nonexistent user', async () => {
    expect(await selectUserByEmailSql(db, 'nobody@nowhere.test')).toBeUndefined();
    expect(await selectUserByIdSql(db, 999)).toBeUndefined();
  });
});
