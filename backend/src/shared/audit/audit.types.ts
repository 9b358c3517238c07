/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Typed audit actions catch typos at compile time.
 * - AuditContext holds the request-level fields repeated on every event.
 *
 * RULES:
 * - Metadata is a plain object; the repo serializes it to jsonb.
 * - Never put tokens, passwords or hashes in metadata.
 * - Never import module types here.
 */

export type AuditAction =
  | 'accounts.register.success'
  | 'accounts.activation.completed'
  | 'accounts.activation.resent'
  | 'accounts.login.success'
  | 'accounts.login.failed'
  | 'accounts.refresh.success'
  | 'accounts.logout.success'
  | 'accounts.password_reset.requested'
  | 'accounts.password_reset.completed'
  | 'accounts.password.changed'
  | 'accounts.admin.user_activated'
  | 'accounts.admin.group_changed';

export type AuditMetadata = Record<string, unknown>;

/**
 * Request-level context, built progressively:
 * - start of request: requestId, ip, userAgent
 * - once the user is known: + userId
 */
export type AuditContext = {
  userId: number | null;

  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

export type AuditEventInsert = AuditContext & {
  action: AuditAction;
  metadata?: AuditMetadata;
};
