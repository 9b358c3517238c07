import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Db } from '../../src/shared/db/db';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import { getUserGroupByName } from '../../src/modules/users/queries/user.queries';
import { AccountTokenRepo } from '../../src/modules/accounts/dal/account-token.repo';
import {
  findActivationToken,
  findPasswordResetTokenForUser,
  findRefreshToken,
} from '../../src/modules/accounts/queries/account-token.queries';
import { createTestDb } from '../helpers/test-db';

const NOW = new Date('2026-04-01T10:00:00.000Z');
const EXPIRES = new Date('2026-04-02T10:00:00.000Z');

describe('account token DAL', () => {
  let db: Db;
  let tokens: AccountTokenRepo;
  let userId: number;

  async function createUser(email: string): Promise<number> {
    const group = await getUserGroupByName(db, 'user');
    const created = await new UserRepo(db).insertUser({
      email,
      hashedPassword: 'h',
      groupId: group?.id ?? -1,
      now: NOW,
    });
    return created.id;
  }

  beforeEach(async () => {
    db = await createTestDb();
    tokens = new AccountTokenRepo(db);
    userId = await createUser('owner@example.com');
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('activation lookup needs both the owner email and the token hash', async () => {
    await tokens.replaceActivationToken({ userId, tokenHash: 'hash-1', expiresAt: EXPIRES, now: NOW });
    const otherId = await createUser('other@example.com');

    const match = await findActivationToken(db, { email: 'OWNER@example.com', tokenHash: 'hash-1' });
    expect(match).toMatchObject({
      userId,
      tokenHash: 'hash-1',
      expiresAt: EXPIRES,
      email: 'owner@example.com',
      userIsActive: false,
    });

    expect(await findActivationToken(db, { email: 'other@example.com', tokenHash: 'hash-1' })).toBeUndefined();
    expect(await findActivationToken(db, { email: 'owner@example.com', tokenHash: 'hash-2' })).toBeUndefined();
    expect(otherId).not.toBe(userId);
  });

  it('replaceActivationToken keeps at most one row per user', async () => {
    await tokens.replaceActivationToken({ userId, tokenHash: 'hash-1', expiresAt: EXPIRES, now: NOW });
    await tokens.replaceActivationToken({ userId, tokenHash: 'hash-2', expiresAt: EXPIRES, now: NOW });

    const rows = await db.selectFrom('activation_tokens').select('token_hash').execute();
    expect(rows).toEqual([{ token_hash: 'hash-2' }]);
  });

  it('deleteActivationTokenById removes just that row', async () => {
    await tokens.replaceActivationToken({ userId, tokenHash: 'hash-1', expiresAt: EXPIRES, now: NOW });
    const match = await findActivationToken(db, { email: 'owner@example.com', tokenHash: 'hash-1' });

    await tokens.deleteActivationTokenById(match?.id ?? -1);

    expect(await findActivationToken(db, { email: 'owner@example.com', tokenHash: 'hash-1' })).toBeUndefined();
  });

  it('replacePasswordResetToken keeps at most one row per user', async () => {
    await tokens.replacePasswordResetToken({ userId, tokenHash: 'reset-1', expiresAt: EXPIRES, now: NOW });
    await tokens.replacePasswordResetToken({ userId, tokenHash: 'reset-2', expiresAt: EXPIRES, now: NOW });

    const stored = await findPasswordResetTokenForUser(db, userId);
    expect(stored?.tokenHash).toBe('reset-2');
    expect(stored?.createdAt).toEqual(NOW);

    await tokens.deletePasswordResetTokensForUser(userId);
    expect(await findPasswordResetTokenForUser(db, userId)).toBeUndefined();
  });

  it('refresh tokens: many per user, deleted one at a time, delete is idempotent', async () => {
    await tokens.insertRefreshToken({ userId, tokenHash: 'rt-1', expiresAt: EXPIRES, now: NOW });
    await tokens.insertRefreshToken({ userId, tokenHash: 'rt-2', expiresAt: EXPIRES, now: NOW });

    await tokens.deleteRefreshToken({ userId, tokenHash: 'rt-1' });
    await tokens.deleteRefreshToken({ userId, tokenHash: 'rt-1' });

    expect(await findRefreshToken(db, { userId, tokenHash: 'rt-1' })).toBeUndefined();
    expect(await findRefreshToken(db, { userId, tokenHash: 'rt-2' })).toMatchObject({
      userId,
      expiresAt: EXPIRES,
      createdAt: NOW,
    });
  });

  it('refresh lookup is scoped to the user', async () => {
    await tokens.insertRefreshToken({ userId, tokenHash: 'rt-1', expiresAt: EXPIRES, now: NOW });
    const otherId = await createUser('other@example.com');

    expect(await findRefreshToken(db, { userId: otherId, tokenHash: 'rt-1' })).toBeUndefined();
  });

  it('withDb binds the repo to a transaction that can roll back', async () => {
    await expect(
      db.transaction().execute(async (trx) => {
        await tokens.withDb(trx).insertRefreshToken({ userId, tokenHash: 'rt-tx', expiresAt: EXPIRES, now: NOW });
        throw new Error('rollback');
      }),
    ).rejects.toThrow('rollback');

    expect(await findRefreshToken(db, { userId, tokenHash: 'rt-tx' })).toBeUndefined();
  });
});
