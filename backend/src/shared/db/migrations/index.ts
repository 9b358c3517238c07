/**
 * src/shared/db/migrations/index.ts
 *
 * WHY:
 * - Static registry of migrations, in apply order.
 * - Used by migrate.ts (Kysely Migrator) and by the test DB bootstrap,
 *   so both apply exactly the same schema.
 *
 * RULES:
 * - Append new migrations at the end; never reorder or rename existing keys.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_accounts_schema';
import * as m0002 from './0002_audit_events';

export const migrations: Record<string, Migration> = {
  '0001_accounts_schema': { up: m0001.up, down: m0001.down },
  '0002_audit_events': { up: m0002.up, down: m0002.down },
};
