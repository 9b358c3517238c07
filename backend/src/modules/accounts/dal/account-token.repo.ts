/**
 * backend/src/modules/accounts/dal/account-token.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for the three token tables.
 *
 * RULES:
 * - No transactions started here; flows bind the repo with withDb(trx).
 * - replace*() deletes the user's previous row before inserting: at most one
 *   activation and one reset token per user (also a unique index on user_id).
 * - Only hashes are written.
 */

import type { DbExecutor } from '../../../shared/db/db';

type NewTokenRow = {
  userId: number;
  tokenHash: string;
  expiresAt: Date;
  now: Date;
};

export class AccountTokenRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): AccountTokenRepo {
    return new AccountTokenRepo(db);
  }

  // ── activation ───────────────────────────────────────────

  async replaceActivationToken(row: NewTokenRow): Promise<void> {
    await this.deleteActivationTokensForUser(row.userId);
    await this.db
      .insertInto('activation_tokens')
      .values({
        user_id: row.userId,
        token_hash: row.tokenHash,
        expires_at: row.expiresAt,
        created_at: row.now,
      })
      .execute();
  }

  async deleteActivationTokenById(id: number): Promise<void> {
    await this.db.deleteFrom('activation_tokens').where('id', '=', id).execute();
  }

  async deleteActivationTokensForUser(userId: number): Promise<void> {
    await this.db.deleteFrom('activation_tokens').where('user_id', '=', userId).execute();
  }

  // ── password reset ───────────────────────────────────────

  async replacePasswordResetToken(row: NewTokenRow): Promise<void> {
    await this.deletePasswordResetTokensForUser(row.userId);
    await this.db
      .insertInto('password_reset_tokens')
      .values({
        user_id: row.userId,
        token_hash: row.tokenHash,
        expires_at: row.expiresAt,
        created_at: row.now,
      })
      .execute();
  }

  async deletePasswordResetTokensForUser(userId: number): Promise<void> {
    await this.db.deleteFrom('password_reset_tokens').where('user_id', '=', userId).execute();
  }

  // ── refresh (one row per session) ────────────────────────

  async insertRefreshToken(row: NewTokenRow): Promise<void> {
    await this.db
      .insertInto('refresh_tokens')
      .values({
        user_id: row.userId,
        token_hash: row.tokenHash,
        expires_at: row.expiresAt,
        created_at: row.now,
      })
      .execute();
  }

  /** Idempotent: deleting an already-revoked token is a no-op. */
  async deleteRefreshToken(params: { userId: number; tokenHash: string }): Promise<void> {
    await this.db
      .deleteFrom('refresh_tokens')
      .where('user_id', '=', params.userId)
      .where('token_hash', '=', params.tokenHash)
      .execute();
  }
}
