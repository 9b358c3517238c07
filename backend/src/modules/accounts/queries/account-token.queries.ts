/**
 * backend/src/modules/accounts/queries/account-token.queries.ts
 *
 * WHY:
 * - Read-only queries that shape token rows into domain types.
 *
 * RULES:
 * - No AppError. Expiry is judged by policies, not here.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectActivationTokenByEmailAndHashSql,
  selectPasswordResetTokenByUserIdSql,
  selectRefreshTokenSql,
} from '../dal/account-token.query-sql';
import type { ActivationTokenMatch, OneTimeToken, RefreshTokenRecord } from '../account.types';

export async function findActivationToken(
  db: DbExecutor,
  params: { email: string; tokenHash: string },
): Promise<ActivationTokenMatch | undefined> {
  const row = await selectActivationTokenByEmailAndHashSql(db, params);
  if (!row) return undefined;

  return {
    id: row.id,
    userId: row.user_id,
    tokenHash: row.token_hash,
    expiresAt: row.expires_at,
    createdAt: row.created_at,
    email: row.email,
    userIsActive: row.is_active,
  };
}

export async function findPasswordResetTokenForUser(
  db: DbExecutor,
  userId: number,
): Promise<OneTimeToken | undefined> {
  const row = await selectPasswordResetTokenByUserIdSql(db, userId);
  if (!row) return undefined;

  return {
    id: row.id,
    userId: row.user_id,
    tokenHash: row.token_hash,
    expiresAt: row.expires_at,
    createdAt: row.created_at,
  };
}

export async function findRefreshToken(
  db: DbExecutor,
  params: { userId: number; tokenHash: string },
): Promise<RefreshTokenRecord | undefined> {
  const row = await selectRefreshTokenSql(db, params);
  if (!row) return undefined;

  return {
    id: row.id,
    userId: row.user_id,
    tokenHash: row.token_hash,
    expiresAt: row.expires_at,
    createdAt: row.created_at,
  };
}
