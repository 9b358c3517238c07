/**
 * backend/src/modules/accounts/flows/register/register-flow.ts
 *
 * WHY:
 * - Creates an inactive account and its activation token, then emails the link.
 *
 * RULES:
 * - Rate limit first (per email, per IP), before any DB work.
 * - User + activation token + audit commit in ONE transaction; any failure inside
 *   it becomes 500 "An error occurred during user creation."
 * - The activation email is enqueued only after commit.
 * - Only the token hash is stored.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { AppError } from '../../../../shared/http/errors';
import { errorFields } from '../../../../shared/logger/logger';
import { addHours, generateSecureToken } from '../../../../shared/security/token';

import { DEFAULT_USER_GROUP, getUserByEmail, getUserGroupByName } from '../../../users';
import { ACCOUNT_RATE_LIMITS } from '../../account.constants';
import { AccountErrors } from '../../account.errors';
import { auditRegisterSuccess } from '../../account.audit';
import type { RegisterResponse, RequestMeta } from '../../account.types';
import { buildActivationLink } from '../../helpers/account-links';
import { emailIdentity } from '../../helpers/email-identity';
import type { AccountFlowDeps } from '../flow-deps';

export type RegisterParams = RequestMeta & {
  email: string;
  password: string;
};

export async function registerFlow(
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
  params: RegisterParams,
): Promise<RegisterResponse> {
  const { email, emailKey, emailDomain } = emailIdentity(deps.tokenHasher, params.email);
  const flow = 'accounts.register';

  deps.logger.info({
    msg: 'accounts.register.start',
    flow,
    requestId: params.requestId,
    emailDomain,
    emailKey,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `register:email:${emailKey}`,
    ...ACCOUNT_RATE_LIMITS.register.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `register:ip:${params.ip ?? 'unknown'}`,
    ...ACCOUNT_RATE_LIMITS.register.perIp,
  });

  const existing = await getUserByEmail(deps.db, email);
  if (existing) throw AccountErrors.emailTaken(email);

  const group = await getUserGroupByName(deps.db, DEFAULT_USER_GROUP);
  if (!group) throw AccountErrors.defaultGroupMissing({ group: DEFAULT_USER_GROUP });

  const hashedPassword = await deps.passwordHasher.hash(params.password);

  const rawToken = generateSecureToken();
  const now = new Date();
  const expiresAt = addHours(now, deps.settings.activationTtlHours);

  let created: { id: number; email: string };
  try {
    created = await deps.db.transaction().execute(async (trx) => {
      const user = await deps.userRepo.withDb(trx).insertUser({
        email,
        hashedPassword,
        groupId: group.id,
        now,
      });

      await deps.tokenRepo.withDb(trx).replaceActivationToken({
        userId: user.id,
        tokenHash: deps.tokenHasher.hash(rawToken),
        expiresAt,
        now,
      });

      const audit = new AuditWriter(deps.auditRepo.withDb(trx), {
        requestId: params.requestId,
        ip: params.ip,
        userAgent: params.userAgent,
      }).withContext({ userId: user.id });

      await auditRegisterSuccess(audit, { userId: user.id, emailDomain });

      return user;
    });
  } catch (err: unknown) {
    if (err instanceof AppError) throw err;

    deps.logger.error({
      msg: 'accounts.register.tx_failed',
      flow,
      requestId: params.requestId,
      emailKey,
      ...errorFields(err),
    });
    throw AccountErrors.userCreationFailed();
  }

  await deps.queue.enqueue({
    type: 'accounts.activation-email',
    userId: created.id,
    email: created.email,
    activationToken: rawToken,
    activationLink: buildActivationLink(deps.settings.publicAppUrl, created.email, rawToken),
  });

  deps.logger.info({
    msg: 'accounts.register.success',
    flow,
    requestId: params.requestId,
    userId: created.id,
    emailDomain,
  });

  return { id: created.id, email: created.email };
}
