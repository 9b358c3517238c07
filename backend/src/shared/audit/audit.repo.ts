/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only persistence of audit events.
 *
 * RULES:
 * - DB concerns only: no business rules, no AppError.
 * - Works on the root db or a transaction (withDb).
 */

import { sql } from 'kysely';

import type { DbExecutor } from '../db/db';
import type { AuditEventInsert } from './audit.types';

// JSON.stringify drops undefined values; the cast keeps the column jsonb.
function metadataValue(input: AuditEventInsert['metadata']) {
  return sql<string>`cast(${JSON.stringify(input ?? {})} as jsonb)`;
}

export class AuditRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): AuditRepo {
    return new AuditRepo(db);
  }

  async append(event: AuditEventInsert): Promise<void> {
    await this.db
      .insertInto('audit_events')
      .values({
        action: event.action,
        user_id: event.userId,
        request_id: event.requestId,
        ip: event.ip,
        user_agent: event.userAgent,
        metadata: metadataValue(event.metadata),
      })
      .execute();
  }
}
