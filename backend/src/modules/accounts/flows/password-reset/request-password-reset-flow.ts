/**
 * backend/src/modules/accounts/flows/password-reset/request-password-reset-flow.ts
 *
 * WHY:
 * - Issues a password reset token for an active account and emails the link.
 *
 * RULES:
 * - Always answers with the generic message (controller returns 200).
 * - Silent paths (rate limited, unknown email, inactive account) send nothing
 *   but are still audited with their `outcome`.
 * - The user's previous reset token is deleted in the same transaction as the insert.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { addHours, generateSecureToken } from '../../../../shared/security/token';

import { getUserByEmail } from '../../../users';
import { auditPasswordResetRequested } from '../../account.audit';
import { ACCOUNT_RATE_LIMITS, GENERIC_EMAIL_SENT_MESSAGE } from '../../account.constants';
import type { MessageResponse, RequestMeta } from '../../account.types';
import { buildPasswordResetLink } from '../../helpers/account-links';
import { emailIdentity } from '../../helpers/email-identity';
import type { AccountFlowDeps } from '../flow-deps';

export type RequestPasswordResetParams = RequestMeta & {
  email: string;
};

export async function requestPasswordResetFlow(
  deps: Pick<
    AccountFlowDeps,
    'db' | 'tokenHasher' | 'logger' | 'rateLimiter' | 'auditRepo' | 'queue' | 'tokenRepo' | 'settings'
  >,
  params: RequestPasswordResetParams,
): Promise<MessageResponse> {
  const { email, emailKey } = emailIdentity(deps.tokenHasher, params.email);
  const flow = 'accounts.password-reset.request';
  const response = { message: GENERIC_EMAIL_SENT_MESSAGE };

  const audit = new AuditWriter(deps.auditRepo, {
    requestId: params.requestId,
    ip: params.ip,
    userAgent: params.userAgent,
  });

  // ── 1. Silent rate limit ─────────────────────────────────
  const withinLimit = await deps.rateLimiter.hitOrSkip({
    key: `reset-request:email:${emailKey}`,
    ...ACCOUNT_RATE_LIMITS.passwordResetRequest.perEmail,
  });

  if (!withinLimit) {
    await auditPasswordResetRequested(audit, { outcome: 'rate_limited' });
    return response;
  }

  // ── 2. Find an active user ───────────────────────────────
  const user = await getUserByEmail(deps.db, email);
  if (!user) {
    await auditPasswordResetRequested(audit, { outcome: 'user_not_found' });
    return response;
  }

  const userAudit = audit.withContext({ userId: user.id });

  if (!user.isActive) {
    await auditPasswordResetRequested(userAudit, { outcome: 'user_inactive' });
    return response;
  }

  // ── 3. Replace the reset token ───────────────────────────
  const rawToken = generateSecureToken();
  const now = new Date();

  await deps.db.transaction().execute(async (trx) => {
    await deps.tokenRepo.withDb(trx).replacePasswordResetToken({
      userId: user.id,
      tokenHash: deps.tokenHasher.hash(rawToken),
      expiresAt: addHours(now, deps.settings.passwordResetTtlHours),
      now,
    });
  });

  // ── 4. Email + audit ─────────────────────────────────────
  await deps.queue.enqueue({
    type: 'accounts.password-reset-email',
    userId: user.id,
    email: user.email,
    resetToken: rawToken,
    resetLink: buildPasswordResetLink(deps.settings.publicAppUrl, user.email, rawToken),
  });

  await auditPasswordResetRequested(userAudit, { outcome: 'sent' });

  deps.logger.info({
    msg: 'accounts.password_reset.requested',
    flow,
    requestId: params.requestId,
    userId: user.id,
    emailKey,
  });

  return response;
}
