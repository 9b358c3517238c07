/**
 * src/modules/accounts/account.audit.ts
 *
 * WHY:
 * - Typed audit helpers: one function per domain action, consistent metadata.
 *
 * RULES:
 * - No DB access (delegates to AuditWriter), no business rules.
 * - Never include passwords, hashes or tokens in metadata.
 *
 * PASSWORD RESET REQUEST:
 * - Written on every request path, including the silent ones, with `outcome`
 *   telling them apart. The HTTP response is identical on all paths.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { UserGroup } from '../users/user.types';

export function auditRegisterSuccess(
  writer: AuditWriter,
  data: { userId: number; emailDomain: string },
): Promise<void> {
  return writer.append('accounts.register.success', data);
}

export function auditActivationCompleted(
  writer: AuditWriter,
  data: { userId: number },
): Promise<void> {
  return writer.append('accounts.activation.completed', data);
}

export function auditActivationResent(writer: AuditWriter, data: { userId: number }): Promise<void> {
  return writer.append('accounts.activation.resent', data);
}

export function auditLoginSuccess(writer: AuditWriter, data: { userId: number }): Promise<void> {
  return writer.append('accounts.login.success', data);
}

export function auditLoginFailed(
  writer: AuditWriter,
  data: { emailKey: string; reason: string },
): Promise<void> {
  return writer.append('accounts.login.failed', data);
}

export function auditRefreshSuccess(writer: AuditWriter, data: { userId: number }): Promise<void> {
  return writer.append('accounts.refresh.success', data);
}

export function auditLogout(writer: AuditWriter, data: { userId: number }): Promise<void> {
  return writer.append('accounts.logout.success', data);
}

export type PasswordResetRequestOutcome = 'sent' | 'user_not_found' | 'user_inactive' | 'rate_limited';

export function auditPasswordResetRequested(
  writer: AuditWriter,
  data: { outcome: PasswordResetRequestOutcome },
): Promise<void> {
  return writer.append('accounts.password_reset.requested', data);
}

export function auditPasswordResetCompleted(
  writer: AuditWriter,
  data: { userId: number },
): Promise<void> {
  return writer.append('accounts.password_reset.completed', data);
}

export function auditPasswordChanged(writer: AuditWriter, data: { userId: number }): Promise<void> {
  return writer.append('accounts.password.changed', data);
}

export function auditAdminUserActivated(
  writer: AuditWriter,
  data: { targetUserId: number },
): Promise<void> {
  return writer.append('accounts.admin.user_activated', data);
}

export function auditAdminGroupChanged(
  writer: AuditWriter,
  data: { targetUserId: number; from: UserGroup; to: UserGroup },
): Promise<void> {
  return writer.append('accounts.admin.group_changed', data);
}
