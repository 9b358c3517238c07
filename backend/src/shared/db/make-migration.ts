/**
 * backend/src/shared/db/make-migration.ts
 *
 * WHY:
 * - One command to scaffold the next numbered migration (0003_..., 0004_...).
 * - Kysely does not generate migrations from models.
 *
 * HOW TO USE:
 * - npm run db:make --workspace=backend -- add_user_last_login
 *
 * RULES:
 * - The new file still has to be registered in migrations/index.ts.
 */

import fs from 'node:fs';
import path from 'node:path';

import { logger } from '../logger/logger';

function normalizeMigrationName(input: string): string {
  return input
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(/[^a-z0-9_]/g, '');
}

function nextMigrationNumber(existingFiles: string[]): string {
  const numbers = existingFiles
    .map((file) => file.match(/^(\d{4})_/))
    .filter((m): m is RegExpMatchArray => Boolean(m))
    .map((m) => Number(m[1]));

  const max = numbers.length ? Math.max(...numbers) : 0;
  return String(max + 1).padStart(4, '0');
}

function migrationTemplate(fileName: string): string {
  return `/**
 * src/shared/db/migrations/${fileName}
 */

import { Kysely } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  void db;
}

export async function down(db: Kysely<any>): Promise<void> {
  void db;
}
`;
}

function main(): void {
  const rawName = process.argv[2];

  if (!rawName) {
    logger.error('migration.make.missing_name', {
      example: 'npm run db:make --workspace=backend -- add_user_last_login',
    });
    process.exit(1);
  }

  // Package scripts run from backend/
  const migrationsDir = path.join(process.cwd(), 'src/shared/db/migrations');
  const existing = fs.readdirSync(migrationsDir);

  const fileName = `${nextMigrationNumber(existing)}_${normalizeMigrationName(rawName)}.ts`;
  const fullPath = path.join(migrationsDir, fileName);

  if (fs.existsSync(fullPath)) {
    logger.error('migration.make.exists', { fileName });
    process.exit(1);
  }

  fs.writeFileSync(fullPath, migrationTemplate(fileName), 'utf8');
  logger.info('migration.make.created', { fileName, register: 'src/shared/db/migrations/index.ts' });
}

main();
