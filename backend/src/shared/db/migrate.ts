/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Apply schema migrations before the server starts (dev + deploy step).
 * - Migrations are registered statically in migrations/index.ts, so the same
 *   list is used here and by the in-process test database.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace=backend
 * - npm run db:migrate --workspace=backend -- down   (reverts the latest migration)
 */

import 'dotenv/config';

import { Migrator } from 'kysely';
import type { MigrationResultSet } from 'kysely';

import { createDb } from './db';
import { migrations } from './migrations';
import { buildConfig } from '../../app/config';
import { errorFields, logger } from '../logger/logger';

function logResults({ error, results }: MigrationResultSet): boolean {
  results?.forEach((r) => {
    if (r.status === 'Success') {
      logger.info('migration.success', { migration: r.migrationName, direction: r.direction });
    }
    if (r.status === 'Error') {
      logger.error('migration.error', { migration: r.migrationName, direction: r.direction });
    }
  });

  if (error) {
    logger.error('migration.failed', { error });
    return false;
  }

  return true;
}

async function runMigrations(direction: 'latest' | 'down'): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  const migrator = new Migrator({
    db,
    provider: {
      getMigrations: async () => migrations,
    },
  });

  logger.info('migration.start', { direction, known: Object.keys(migrations) });

  const resultSet =
    direction === 'down' ? await migrator.migrateDown() : await migrator.migrateToLatest();

  await db.destroy();

  if (!logResults(resultSet)) {
    process.exit(1);
  }

  logger.info('migration.done', { direction });
}

const direction = process.argv[2] === 'down' ? 'down' : 'latest';

void runMigrations(direction).catch((err: unknown) => {
  logger.error('migration.fatal', errorFields(err));
  process.exit(1);
});
