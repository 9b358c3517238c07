/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type every query.
 * - One interface per table, snake_case like the real columns.
 *
 * RULES:
 * - Keep aligned with ./migrations. A migration that adds/renames a column
 *   updates this file in the same change.
 * - Generated<T> marks columns the DB fills (serial ids, DEFAULT now()).
 */

import type { ColumnType, Generated } from 'kysely';

type CreatedAt = Generated<Date>;

export interface UserGroups {
  id: Generated<number>;
  name: string;
}

export interface Users {
  id: Generated<number>;
  email: string;
  hashed_password: string;
  is_active: Generated<boolean>;
  group_id: number;
  created_at: CreatedAt;
  updated_at: Generated<Date>;
}

export interface ActivationTokens {
  id: Generated<number>;
  user_id: number;
  token_hash: string;
  expires_at: Date;
  created_at: CreatedAt;
}

export interface PasswordResetTokens {
  id: Generated<number>;
  user_id: number;
  token_hash: string;
  expires_at: Date;
  created_at: CreatedAt;
}

export interface RefreshTokens {
  id: Generated<number>;
  user_id: number;
  token_hash: string;
  expires_at: Date;
  created_at: CreatedAt;
}

export interface AuditEvents {
  id: Generated<number>;
  user_id: number | null;
  action: string;
  request_id: string | null;
  ip: string | null;
  user_agent: string | null;
  // Written as a JSON string cast to jsonb, read back as the parsed value.
  metadata: ColumnType<unknown, string | undefined, string>;
  created_at: CreatedAt;
}

export interface DB {
  user_groups: UserGroups;
  users: Users;
  activation_tokens: ActivationTokens;
  password_reset_tokens: PasswordResetTokens;
  refresh_tokens: RefreshTokens;
  audit_events: AuditEvents;
}
