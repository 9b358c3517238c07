/**
 * src/shared/db/migrations/0001_accounts_schema.ts
 *
 * WHY:
 * - Accounts core: user groups (roles), users, and the three token tables
 *   (activation, password reset, refresh).
 * - Every token row belongs to a user; deleting a user cascades to its tokens.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace=backend
 */

import { Kysely, sql } from 'kysely';

import { USER_GROUPS } from '../../../modules/users/user.types';

export async function up(db: Kysely<any>): Promise<void> {
  // ---- user_groups (roles) ----
  await db.schema
    .createTable('user_groups')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('name', 'text', (col) => col.notNull().unique())
    .execute();

  await db
    .insertInto('user_groups')
    .values(USER_GROUPS.map((name) => ({ name })))
    .execute();

  // ---- users ----
  await db.schema
    .createTable('users')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('email', 'varchar(255)', (col) => col.notNull().unique())
    .addColumn('hashed_password', 'varchar(255)', (col) => col.notNull())
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('group_id', 'integer', (col) =>
      col.notNull().references('user_groups.id').onDelete('cascade'),
    )
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema.createIndex('users_group_id_idx').on('users').column('group_id').execute();

  // ---- activation_tokens (one per user) ----
  await db.schema
    .createTable('activation_tokens')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('user_id', 'integer', (col) =>
      col.notNull().unique().references('users.id').onDelete('cascade'),
    )
    .addColumn('token_hash', 'text', (col) => col.notNull().unique())
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  // ---- password_reset_tokens (one per user) ----
  await db.schema
    .createTable('password_reset_tokens')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('user_id', 'integer', (col) =>
      col.notNull().unique().references('users.id').onDelete('cascade'),
    )
    .addColumn('token_hash', 'text', (col) => col.notNull().unique())
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  // ---- refresh_tokens (one per session; many per user) ----
  await db.schema
    .createTable('refresh_tokens')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('user_id', 'integer', (col) =>
      col.notNull().references('users.id').onDelete('cascade'),
    )
    .addColumn('token_hash', 'text', (col) => col.notNull().unique())
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('refresh_tokens_user_id_idx')
    .on('refresh_tokens')
    .column('user_id')
    .execute();

  // Expiry sweeps filter on expires_at
  await db.schema
    .createIndex('activation_tokens_expires_at_idx')
    .on('activation_tokens')
    .column('expires_at')
    .execute();
  await db.schema
    .createIndex('password_reset_tokens_expires_at_idx')
    .on('password_reset_tokens')
    .column('expires_at')
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  // Drop in reverse dependency order
  await db.schema.dropTable('refresh_tokens').ifExists().execute();
  await db.schema.dropTable('password_reset_tokens').ifExists().execute();
  await db.schema.dropTable('activation_tokens').ifExists().execute();
  await db.schema.dropTable('users').ifExists().execute();
  await db.schema.dropTable('user_groups').ifExists().execute();
}
