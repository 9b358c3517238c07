/**
 * backend/src/modules/accounts/flows/session/logout-flow.ts
 *
 * WHY:
 * - Revokes one session by deleting its refresh token row.
 *
 * RULES:
 * - Undecodable token -> 400 "Failed to logout. Invalid or expired token."
 * - Idempotent: a token that is already gone still answers 200.
 * - Other sessions of the same user are untouched.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { isTokenDecodeError } from '../../../../shared/security/token-errors';
import type { DecodedToken } from '../../../../shared/security/jwt-token-manager';

import { auditLogout } from '../../account.audit';
import { ACCOUNT_MESSAGES } from '../../account.constants';
import { AccountErrors } from '../../account.errors';
import type { MessageResponse, RequestMeta } from '../../account.types';
import type { AccountFlowDeps } from '../flow-deps';

export type LogoutParams = RequestMeta & {
  refreshToken: string;
};

export async function logoutFlow(
  deps: Pick<AccountFlowDeps, 'tokenHasher' | 'tokenManager' | 'logger' | 'auditRepo' | 'tokenRepo'>,
  params: LogoutParams,
): Promise<MessageResponse> {
  const flow = 'accounts.logout';

  let decoded: DecodedToken;
  try {
    decoded = deps.tokenManager.decodeRefreshToken(params.refreshToken);
  } catch (err: unknown) {
    if (!isTokenDecodeError(err)) throw err;

    deps.logger.info({
      msg: 'accounts.logout.undecodable',
      flow,
      requestId: params.requestId,
      error: err.name,
    });
    throw AccountErrors.logoutTokenInvalid();
  }

  await deps.tokenRepo.deleteRefreshToken({
    userId: decoded.userId,
    tokenHash: deps.tokenHasher.hash(params.refreshToken),
  });

  const audit = new AuditWriter(deps.auditRepo, {
    requestId: params.requestId,
    ip: params.ip,
    userAgent: params.userAgent,
    userId: decoded.userId,
  });
  await auditLogout(audit, { userId: decoded.userId });

  deps.logger.info({
    msg: 'accounts.logout.success',
    flow,
    requestId: params.requestId,
    userId: decoded.userId,
  });

  return { message: ACCOUNT_MESSAGES.loggedOut };
}
