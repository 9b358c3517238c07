/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users.
 *
 * RULES:
 * - No transactions started here (flows own the tx).
 * - No AppError, no policies.
 * - withDb() binds the repo to a transaction.
 * - Emails are stored lowercase.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  /**
   * Inserts an inactive user. Email uniqueness is a DB constraint;
   * register checks first so the constraint only fires on a race.
   */
  async insertUser(params: {
    email: string;
    hashedPassword: string;
    groupId: number;
    now: Date;
  }): Promise<{ id: number; email: string }> {
    const row = await this.db
      .insertInto('users')
      .values({
        email: params.email.toLowerCase(),
        hashed_password: params.hashedPassword,
        group_id: params.groupId,
        is_active: false,
        created_at: params.now,
        updated_at: params.now,
      })
      .returning(['id', 'email'])
      .executeTakeFirstOrThrow();

    return { id: row.id, email: row.email };
  }

  async activate(params: { userId: number; now: Date }): Promise<void> {
    await this.db
      .updateTable('users')
      .set({ is_active: true, updated_at: params.now })
      .where('id', '=', params.userId)
      .execute();
  }

  async updatePassword(params: { userId: number; hashedPassword: string; now: Date }): Promise<void> {
    await this.db
      .updateTable('users')
      .set({ hashed_password: params.hashedPassword, updated_at: params.now })
      .where('id', '=', params.userId)
      .execute();
  }

  async updateGroup(params: { userId: number; groupId: number; now: Date }): Promise<void> {
    await this.db
      .updateTable('users')
      .set({ group_id: params.groupId, updated_at: params.now })
      .where('id', '=', params.userId)
      .execute();
  }
}
