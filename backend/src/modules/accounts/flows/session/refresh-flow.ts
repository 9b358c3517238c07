/**
 * backend/src/modules/accounts/flows/session/refresh-flow.ts
 *
 * WHY:
 * - Exchanges a live refresh token for a new access token.
 *
 * RULES:
 * - Undecodable token -> 400 with the decoder's message.
 * - Token must still be stored for its user (logout deletes it) -> else 401.
 * - The refresh token is NOT rotated.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { isTokenDecodeError } from '../../../../shared/security/token-errors';
import type { DecodedToken } from '../../../../shared/security/jwt-token-manager';

import { getUserById } from '../../../users';
import { auditRefreshSuccess } from '../../account.audit';
import { TOKEN_TYPE } from '../../account.constants';
import { AccountErrors } from '../../account.errors';
import type { AccessTokenResponse, RequestMeta } from '../../account.types';
import { findRefreshToken } from '../../queries/account-token.queries';
import type { AccountFlowDeps } from '../flow-deps';

export type RefreshParams = RequestMeta & {
  refreshToken: string;
};

export async function refreshFlow(
  deps: Pick<AccountFlowDeps, 'db' | 'tokenHasher' | 'tokenManager' | 'logger' | 'auditRepo'>,
  params: RefreshParams,
): Promise<AccessTokenResponse> {
  const flow = 'accounts.refresh';

  let decoded: DecodedToken;
  try {
    decoded = deps.tokenManager.decodeRefreshToken(params.refreshToken);
  } catch (err: unknown) {
    if (!isTokenDecodeError(err)) throw err;

    deps.logger.info({
      msg: 'accounts.refresh.undecodable',
      flow,
      requestId: params.requestId,
      error: err.name,
    });
    throw AccountErrors.refreshTokenUndecodable(err.message);
  }

  const stored = await findRefreshToken(deps.db, {
    userId: decoded.userId,
    tokenHash: deps.tokenHasher.hash(params.refreshToken),
  });
  if (!stored) {
    deps.logger.info({
      msg: 'accounts.refresh.not_found',
      flow,
      requestId: params.requestId,
      userId: decoded.userId,
    });
    throw AccountErrors.refreshTokenNotFound();
  }

  const user = await getUserById(deps.db, decoded.userId);
  if (!user) throw AccountErrors.userNotFound({ userId: decoded.userId });

  const accessToken = deps.tokenManager.createAccessToken({ userId: user.id });

  const audit = new AuditWriter(deps.auditRepo, {
    requestId: params.requestId,
    ip: params.ip,
    userAgent: params.userAgent,
    userId: user.id,
  });
  await auditRefreshSuccess(audit, { userId: user.id });

  deps.logger.info({
    msg: 'accounts.refresh.success',
    flow,
    requestId: params.requestId,
    userId: user.id,
  });

  return { access_token: accessToken, token_type: TOKEN_TYPE };
}
