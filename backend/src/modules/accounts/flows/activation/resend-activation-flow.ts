/**
 * backend/src/modules/accounts/flows/activation/resend-activation-flow.ts
 *
 * WHY:
 * - Issues a fresh activation token for an inactive account and emails it.
 *
 * RULES:
 * - Anti-enumeration: unknown email and already-active account return the same
 *   generic message as the success path, and send nothing.
 * - The previous activation token is deleted in the same transaction as the insert.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { addHours, generateSecureToken } from '../../../../shared/security/token';

import { getUserByEmail } from '../../../users';
import { auditActivationResent } from '../../account.audit';
import { GENERIC_EMAIL_SENT_MESSAGE } from '../../account.constants';
import type { MessageResponse, RequestMeta } from '../../account.types';
import { buildActivationLink } from '../../helpers/account-links';
import { emailIdentity } from '../../helpers/email-identity';
import type { AccountFlowDeps } from '../flow-deps';

export type ResendActivationParams = RequestMeta & {
  email: string;
};

export async function resendActivationFlow(
  deps: Pick<
    AccountFlowDeps,
    'db' | 'tokenHasher' | 'logger' | 'auditRepo' | 'queue' | 'tokenRepo' | 'settings'
  >,
  params: ResendActivationParams,
): Promise<MessageResponse> {
  const { email, emailKey } = emailIdentity(deps.tokenHasher, params.email);
  const flow = 'accounts.activation.resend';
  const response = { message: GENERIC_EMAIL_SENT_MESSAGE };

  const user = await getUserByEmail(deps.db, email);
  if (!user || user.isActive) {
    deps.logger.info({
      msg: 'accounts.activation.resend.skipped',
      flow,
      requestId: params.requestId,
      emailKey,
      reason: user ? 'already_active' : 'user_not_found',
    });
    return response;
  }

  const rawToken = generateSecureToken();
  const now = new Date();

  await deps.db.transaction().execute(async (trx) => {
    await deps.tokenRepo.withDb(trx).replaceActivationToken({
      userId: user.id,
      tokenHash: deps.tokenHasher.hash(rawToken),
      expiresAt: addHours(now, deps.settings.activationTtlHours),
      now,
    });

    const audit = new AuditWriter(deps.auditRepo.withDb(trx), {
      requestId: params.requestId,
      ip: params.ip,
      userAgent: params.userAgent,
    }).withContext({ userId: user.id });

    await auditActivationResent(audit, { userId: user.id });
  });

  await deps.queue.enqueue({
    type: 'accounts.activation-email',
    userId: user.id,
    email: user.email,
    activationToken: rawToken,
    activationLink: buildActivationLink(deps.settings.publicAppUrl, user.email, rawToken),
  });

  deps.logger.info({
    msg: 'accounts.activation.resend.sent',
    flow,
    requestId: params.requestId,
    userId: user.id,
  });

  return response;
}
