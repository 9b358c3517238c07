/**
 * backend/src/modules/accounts/flows/admin/admin-change-group-flow.ts
 *
 * WHY:
 * - Lets an admin move a user between groups (user / moderator / admin).
 *
 * RULES:
 * - Unknown user -> 404 "User not found." (checked first).
 * - Unknown group name -> 404 "Group not found."
 * - The new group applies to the user's next request: the bearer hook reads the
 *   group from the DB, not from the access token.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';

import { getUserById, getUserGroupByName, isUserGroup } from '../../../users';
import { auditAdminGroupChanged } from '../../account.audit';
import { ACCOUNT_MESSAGES } from '../../account.constants';
import { AccountErrors } from '../../account.errors';
import type { MessageResponse, RequestMeta } from '../../account.types';
import type { AccountFlowDeps } from '../flow-deps';

export type AdminChangeGroupParams = RequestMeta & {
  actorUserId: number;
  targetUserId: number;
  group: string;
};

export async function adminChangeGroupFlow(
  deps: Pick<AccountFlowDeps, 'db' | 'logger' | 'auditRepo' | 'userRepo'>,
  params: AdminChangeGroupParams,
): Promise<MessageResponse> {
  const flow = 'accounts.admin.change-group';

  const target = await getUserById(deps.db, params.targetUserId);
  if (!target) throw AccountErrors.userNotFound({ userId: params.targetUserId });

  const requested = params.group.toLowerCase();
  const group = isUserGroup(requested) ? await getUserGroupByName(deps.db, requested) : undefined;
  if (!group) throw AccountErrors.groupNotFound({ group: params.group });

  const now = new Date();

  await deps.db.transaction().execute(async (trx) => {
    await deps.userRepo.withDb(trx).updateGroup({ userId: target.id, groupId: group.id, now });

    const audit = new AuditWriter(deps.auditRepo.withDb(trx), {
      requestId: params.requestId,
      ip: params.ip,
      userAgent: params.userAgent,
      userId: params.actorUserId,
    });
    await auditAdminGroupChanged(audit, {
      targetUserId: target.id,
      from: target.group,
      to: group.name,
    });
  });

  deps.logger.info({
    msg: 'accounts.admin.group_changed',
    flow,
    requestId: params.requestId,
    userId: params.actorUserId,
    targetUserId: target.id,
    to: group.name,
  });

  return { message: ACCOUNT_MESSAGES.groupChanged(group.name) };
}
