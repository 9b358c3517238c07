/**
 * backend/src/modules/accounts/flows/activation/activate-flow.ts
 *
 * WHY:
 * - Proves email ownership: (email, token) must match a live activation token.
 *
 * RULES:
 * - An expired token row is deleted before answering 400.
 * - Activation flips is_active and deletes the token in one transaction.
 * - The "account activated" email is enqueued after commit.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';

import { auditActivationCompleted } from '../../account.audit';
import { ACCOUNT_MESSAGES } from '../../account.constants';
import type { MessageResponse, RequestMeta } from '../../account.types';
import { buildLoginLink } from '../../helpers/account-links';
import { emailIdentity } from '../../helpers/email-identity';
import {
  assertActivationAllowed,
  getActivationFailure,
} from '../../policies/activation-gating.policy';
import { findActivationToken } from '../../queries/account-token.queries';
import type { AccountFlowDeps } from '../flow-deps';

export type ActivateParams = RequestMeta & {
  email: string;
  token: string;
};

export async function activateFlow(
  deps: Pick<
    AccountFlowDeps,
    'db' | 'tokenHasher' | 'logger' | 'auditRepo' | 'queue' | 'userRepo' | 'tokenRepo' | 'settings'
  >,
  params: ActivateParams,
): Promise<MessageResponse> {
  const { email, emailKey } = emailIdentity(deps.tokenHasher, params.email);
  const flow = 'accounts.activate';
  const now = new Date();

  const match = await findActivationToken(deps.db, {
    email,
    tokenHash: deps.tokenHasher.hash(params.token),
  });

  const failure = getActivationFailure(match, now);
  if (failure) {
    if (failure.staleTokenId !== null) {
      await deps.tokenRepo.deleteActivationTokenById(failure.staleTokenId);
    }

    deps.logger.info({
      msg: 'accounts.activate.rejected',
      flow,
      requestId: params.requestId,
      emailKey,
      reason: failure.reason,
    });
    throw failure.error;
  }
  assertActivationAllowed(match, now);

  const userId = match.userId;

  await deps.db.transaction().execute(async (trx) => {
    await deps.userRepo.withDb(trx).activate({ userId, now });
    await deps.tokenRepo.withDb(trx).deleteActivationTokensForUser(userId);

    const audit = new AuditWriter(deps.auditRepo.withDb(trx), {
      requestId: params.requestId,
      ip: params.ip,
      userAgent: params.userAgent,
    }).withContext({ userId });

    await auditActivationCompleted(audit, { userId });
  });

  await deps.queue.enqueue({
    type: 'accounts.activation-complete-email',
    userId,
    email: match.email,
    loginLink: buildLoginLink(deps.settings.publicAppUrl),
  });

  deps.logger.info({ msg: 'accounts.activate.success', flow, requestId: params.requestId, userId });

  return { message: ACCOUNT_MESSAGES.activated };
}
