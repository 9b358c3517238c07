/**
 * backend/src/modules/accounts/flows/session/login-flow.ts
 *
 * WHY:
 * - Exchanges email + password for an access/refresh token pair.
 * - Each login is a new session: one refresh_tokens row, other sessions untouched.
 *
 * RULES:
 * - Rate limit per email and per IP before any DB work.
 * - Gating order lives in login-gating.policy (password before active flag).
 * - Failure audit is written outside any transaction; success audit commits with
 *   the refresh row. A failed insert becomes 500 "An error occurred while
 *   processing the request."
 * - The refresh row stores the token hash and expires LOGIN_TIME_DAYS after creation.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { AppError } from '../../../../shared/http/errors';
import { errorFields } from '../../../../shared/logger/logger';

import { getUserWithPasswordByEmail } from '../../../users';
import { auditLoginFailed, auditLoginSuccess } from '../../account.audit';
import { ACCOUNT_RATE_LIMITS, TOKEN_TYPE } from '../../account.constants';
import { AccountErrors } from '../../account.errors';
import type { RequestMeta, TokenPairResponse } from '../../account.types';
import { emailIdentity } from '../../helpers/email-identity';
import { getLoginFailure } from '../../policies/login-gating.policy';
import type { AccountFlowDeps } from '../flow-deps';

export type LoginParams = RequestMeta & {
  email: string;
  password: string;
};

export async function loginFlow(
  deps: Pick<
    AccountFlowDeps,
    | 'db'
    | 'tokenHasher'
    | 'passwordHasher'
    | 'tokenManager'
    | 'logger'
    | 'rateLimiter'
    | 'auditRepo'
    | 'tokenRepo'
  >,
  params: LoginParams,
): Promise<TokenPairResponse> {
  const { email, emailKey, emailDomain } = emailIdentity(deps.tokenHasher, params.email);
  const flow = 'accounts.login';

  deps.logger.info({
    msg: 'accounts.login.start',
    flow,
    requestId: params.requestId,
    emailDomain,
    emailKey,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `login:email:${emailKey}`,
    ...ACCOUNT_RATE_LIMITS.login.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `login:ip:${params.ip ?? 'unknown'}`,
    ...ACCOUNT_RATE_LIMITS.login.perIp,
  });

  const auditContext = {
    requestId: params.requestId,
    ip: params.ip,
    userAgent: params.userAgent,
  };

  const user = await getUserWithPasswordByEmail(deps.db, email);
  const passwordValid = user
    ? await deps.passwordHasher.verify(params.password, user.hashedPassword)
    : false;

  const failure = getLoginFailure({ user, passwordValid });
  if (failure || !user) {
    const reason = failure?.reason ?? 'user_not_found';

    const audit = new AuditWriter(deps.auditRepo, { ...auditContext, userId: user?.id ?? null });
    await auditLoginFailed(audit, { emailKey, reason });
    deps.logger.warn({
      msg: 'accounts.login.failed',
      flow,
      requestId: params.requestId,
      emailKey,
      reason,
    });
    throw failure?.error ?? AccountErrors.invalidCredentials();
  }

  const accessToken = deps.tokenManager.createAccessToken({ userId: user.id });
  const refreshToken = deps.tokenManager.createRefreshToken({ userId: user.id });

  const now = new Date();
  const expiresAt = new Date(now.getTime() + deps.tokenManager.refreshTtlSeconds * 1000);

  try {
    await deps.db.transaction().execute(async (trx) => {
      await deps.tokenRepo.withDb(trx).insertRefreshToken({
        userId: user.id,
        tokenHash: deps.tokenHasher.hash(refreshToken),
        expiresAt,
        now,
      });

      const audit = new AuditWriter(deps.auditRepo.withDb(trx), {
        ...auditContext,
        userId: user.id,
      });
      await auditLoginSuccess(audit, { userId: user.id });
    });
  } catch (err: unknown) {
    if (err instanceof AppError) throw err;

    deps.logger.error({
      msg: 'accounts.login.tx_failed',
      flow,
      requestId: params.requestId,
      userId: user.id,
      ...errorFields(err),
    });
    throw AccountErrors.loginFailed();
  }

  deps.logger.info({
    msg: 'accounts.login.success',
    flow,
    requestId: params.requestId,
    userId: user.id,
  });

  return { access_token: accessToken, refresh_token: refreshToken, token_type: TOKEN_TYPE };
}
