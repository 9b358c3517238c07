/**
 * backend/src/modules/accounts/flows/password-reset/reset-password-flow.ts
 *
 * WHY:
 * - Consumes a password reset token and sets the new password.
 *
 * RULES:
 * - Rate limit by IP (hard 429).
 * - Every rejection answers 400 "Invalid email or token."; a mismatched or
 *   expired token row is deleted on the way out.
 * - The new password already passed the policy (request schema).
 * - Password update + token delete + audit commit in one transaction; any failure
 *   inside it becomes 500 "An error occurred while resetting the password."
 * - Refresh tokens are left alone: existing sessions stay valid.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { AppError } from '../../../../shared/http/errors';
import { errorFields } from '../../../../shared/logger/logger';

import { getUserByEmail } from '../../../users';
import { auditPasswordResetCompleted } from '../../account.audit';
import { ACCOUNT_MESSAGES, ACCOUNT_RATE_LIMITS } from '../../account.constants';
import { AccountErrors } from '../../account.errors';
import type { MessageResponse, RequestMeta } from '../../account.types';
import { buildLoginLink } from '../../helpers/account-links';
import { emailIdentity } from '../../helpers/email-identity';
import { getResetTokenFailure } from '../../policies/reset-token.policy';
import { findPasswordResetTokenForUser } from '../../queries/account-token.queries';
import type { AccountFlowDeps } from '../flow-deps';

export type ResetPasswordParams = RequestMeta & {
  email: string;
  token: string;
  password: string;
};

export async function resetPasswordFlow(
  deps: Pick<
    AccountFlowDeps,
    | 'db'
    | 'tokenHasher'
    | 'passwordHasher'
    | 'logger'
    | 'rateLimiter'
    | 'auditRepo'
    | 'queue'
    | 'userRepo'
    | 'tokenRepo'
    | 'settings'
  >,
  params: ResetPasswordParams,
): Promise<MessageResponse> {
  const { email, emailKey } = emailIdentity(deps.tokenHasher, params.email);
  const flow = 'accounts.password-reset.complete';

  await deps.rateLimiter.hitOrThrow({
    key: `reset-complete:ip:${params.ip ?? 'unknown'}`,
    ...ACCOUNT_RATE_LIMITS.passwordResetComplete.perIp,
  });

  const now = new Date();
  const user = await getUserByEmail(deps.db, email);
  const storedToken =
    user && user.isActive ? await findPasswordResetTokenForUser(deps.db, user.id) : undefined;

  const failure = getResetTokenFailure({
    user,
    storedToken,
    presentedTokenHash: deps.tokenHasher.hash(params.token),
    now,
  });

  if (failure || !user) {
    if (failure?.deleteStoredToken && storedToken) {
      await deps.tokenRepo.deletePasswordResetTokensForUser(storedToken.userId);
    }

    deps.logger.info({
      msg: 'accounts.password_reset.rejected',
      flow,
      requestId: params.requestId,
      emailKey,
      reason: failure?.reason ?? 'user_not_found',
    });
    throw failure?.error ?? AccountErrors.resetTokenInvalid();
  }

  const hashedPassword = await deps.passwordHasher.hash(params.password);

  try {
    await deps.db.transaction().execute(async (trx) => {
      await deps.userRepo.withDb(trx).updatePassword({ userId: user.id, hashedPassword, now });
      await deps.tokenRepo.withDb(trx).deletePasswordResetTokensForUser(user.id);

      const audit = new AuditWriter(deps.auditRepo.withDb(trx), {
        requestId: params.requestId,
        ip: params.ip,
        userAgent: params.userAgent,
      }).withContext({ userId: user.id });

      await auditPasswordResetCompleted(audit, { userId: user.id });
    });
  } catch (err: unknown) {
    if (err instanceof AppError) throw err;

    deps.logger.error({
      msg: 'accounts.password_reset.tx_failed',
      flow,
      requestId: params.requestId,
      userId: user.id,
      ...errorFields(err),
    });
    throw AccountErrors.passwordResetFailed();
  }

  await deps.queue.enqueue({
    type: 'accounts.password-reset-complete-email',
    userId: user.id,
    email: user.email,
    loginLink: buildLoginLink(deps.settings.publicAppUrl),
  });

  deps.logger.info({
    msg: 'accounts.password_reset.completed',
    flow,
    requestId: params.requestId,
    userId: user.id,
  });

  return { message: ACCOUNT_MESSAGES.passwordReset };
}
