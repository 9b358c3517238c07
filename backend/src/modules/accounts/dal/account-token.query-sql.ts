/**
 * backend/src/modules/accounts/dal/account-token.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for activation, password-reset and refresh token rows.
 *
 * RULES:
 * - Lookups take the token HASH, never the raw value.
 * - No AppError, no policies, no transactions.
 */

import type { Selectable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { PasswordResetTokens, RefreshTokens } from '../../../shared/db/schema';

export type PasswordResetTokenRow = Selectable<PasswordResetTokens>;
export type RefreshTokenRow = Selectable<RefreshTokens>;

export type ActivationTokenMatchRow = {
  id: number;
  user_id: number;
  token_hash: string;
  expires_at: Date;
  created_at: Date;
  email: string;
  is_active: boolean;
};

/** Activation token matched on BOTH the owner's email and the token hash. */
export async function selectActivationTokenByEmailAndHashSql(
  db: DbExecutor,
  params: { email: string; tokenHash: string },
): Promise<ActivationTokenMatchRow | undefined> {
  return db
    .selectFrom('activation_tokens')
    .innerJoin('users', 'users.id', 'activation_tokens.user_id')
    .select([
      'activation_tokens.id',
      'activation_tokens.user_id',
      'activation_tokens.token_hash',
      'activation_tokens.expires_at',
      'activation_tokens.created_at',
      'users.email',
      'users.is_active',
    ])
    .where('users.email', '=', params.email.toLowerCase())
    .where('activation_tokens.token_hash', '=', params.tokenHash)
    .executeTakeFirst();
}

export async function selectPasswordResetTokenByUserIdSql(
  db: DbExecutor,
  userId: number,
): Promise<PasswordResetTokenRow | undefined> {
  return db
    .selectFrom('password_reset_tokens')
    .selectAll()
    .where('user_id', '=', userId)
    .executeTakeFirst();
}

export async function selectRefreshTokenSql(
  db: DbExecutor,
  params: { userId: number; tokenHash: string },
): Promise<RefreshTokenRow | undefined> {
  return db
    .selectFrom('refresh_tokens')
    .selectAll()
    .where('user_id', '=', params.userId)
    .where('token_hash', '=', params.tokenHash)
    .executeTakeFirst();
}
