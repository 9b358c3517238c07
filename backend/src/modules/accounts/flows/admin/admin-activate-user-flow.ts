/**
 * backend/src/modules/accounts/flows/admin/admin-activate-user-flow.ts
 *
 * WHY:
 * - Lets an admin activate an account without the email round-trip.
 *
 * RULES:
 * - Caller is already checked as admin (controller guard).
 * - Unknown user -> 404; already active -> 200 with its own message, no writes.
 * - Any pending activation token is deleted with the activation.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';

import { getUserById } from '../../../users';
import { auditAdminUserActivated } from '../../account.audit';
import { ACCOUNT_MESSAGES } from '../../account.constants';
import { AccountErrors } from '../../account.errors';
import type { MessageResponse, RequestMeta } from '../../account.types';
import type { AccountFlowDeps } from '../flow-deps';

export type AdminActivateUserParams = RequestMeta & {
  actorUserId: number;
  targetUserId: number;
};

export async function adminActivateUserFlow(
  deps: Pick<AccountFlowDeps, 'db' | 'logger' | 'auditRepo' | 'userRepo' | 'tokenRepo'>,
  params: AdminActivateUserParams,
): Promise<MessageResponse> {
  const flow = 'accounts.admin.activate-user';

  const target = await getUserById(deps.db, params.targetUserId);
  if (!target) throw AccountErrors.userNotFound({ userId: params.targetUserId });

  if (target.isActive) {
    return { message: ACCOUNT_MESSAGES.adminAlreadyActive };
  }

  const now = new Date();

  await deps.db.transaction().execute(async (trx) => {
    await deps.userRepo.withDb(trx).activate({ userId: target.id, now });
    await deps.tokenRepo.withDb(trx).deleteActivationTokensForUser(target.id);

    const audit = new AuditWriter(deps.auditRepo.withDb(trx), {
      requestId: params.requestId,
      ip: params.ip,
      userAgent: params.userAgent,
      userId: params.actorUserId,
    });
    await auditAdminUserActivated(audit, { targetUserId: target.id });
  });

  deps.logger.info({
    msg: 'accounts.admin.user_activated',
    flow,
    requestId: params.requestId,
    userId: params.actorUserId,
    targetUserId: target.id,
  });

  return { message: ACCOUNT_MESSAGES.adminActivated };
}
