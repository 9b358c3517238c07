/**
 * backend/src/modules/accounts/flows/profile/change-password-flow.ts
 *
 * WHY:
 * - Authenticated password change (knows the old password, no email round-trip).
 *
 * RULES:
 * - Wrong old password -> 400 "Old password is incorrect."
 * - New password already passed the policy (request schema).
 * - Existing refresh tokens stay valid.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';

import { getUserWithPasswordById } from '../../../users';
import { auditPasswordChanged } from '../../account.audit';
import { ACCOUNT_MESSAGES } from '../../account.constants';
import { AccountErrors } from '../../account.errors';
import type { MessageResponse, RequestMeta } from '../../account.types';
import type { AccountFlowDeps } from '../flow-deps';

export type ChangePasswordParams = RequestMeta & {
  userId: number;
  oldPassword: string;
  newPassword: string;
};

export async function changePasswordFlow(
  deps: Pick<AccountFlowDeps, 'db' | 'passwordHasher' | 'logger' | 'auditRepo' | 'userRepo'>,
  params: ChangePasswordParams,
): Promise<MessageResponse> {
  const flow = 'accounts.change-password';

  const user = await getUserWithPasswordById(deps.db, params.userId);
  if (!user) throw AccountErrors.userNotFound({ userId: params.userId });

  const oldPasswordValid = await deps.passwordHasher.verify(params.oldPassword, user.hashedPassword);
  if (!oldPasswordValid) {
    deps.logger.info({
      msg: 'accounts.change_password.rejected',
      flow,
      requestId: params.requestId,
      userId: user.id,
      reason: 'wrong_old_password',
    });
    throw AccountErrors.oldPasswordIncorrect();
  }

  const hashedPassword = await deps.passwordHasher.hash(params.newPassword);
  const now = new Date();

  await deps.db.transaction().execute(async (trx) => {
    await deps.userRepo.withDb(trx).updatePassword({ userId: user.id, hashedPassword, now });

    const audit = new AuditWriter(deps.auditRepo.withDb(trx), {
      requestId: params.requestId,
      ip: params.ip,
      userAgent: params.userAgent,
      userId: user.id,
    });
    await auditPasswordChanged(audit, { userId: user.id });
  });

  deps.logger.info({
    msg: 'accounts.change_password.success',
    flow,
    requestId: params.requestId,
    userId: user.id,
  });

  return { message: ACCOUNT_MESSAGES.passwordChanged };
}
