/**
 * src/modules/accounts/account.service.ts
 *
 * WHY:
 * - Single entry point of the accounts module for controllers.
 * - Each use-case lives in its own flow (flows/*); the service only hands each
 *   flow its dependencies.
 *
 * RULES:
 * - No HTTP concerns here.
 * - Transactions are opened inside flows, never by controllers.
 * - Never log or return raw passwords, password hashes or stored token hashes.
 */

import { getUserById } from '../users';
import { AccountErrors } from './account.errors';
import type {
  AccessTokenResponse,
  AccountSummary,
  MessageResponse,
  RegisterResponse,
  TokenPairResponse,
} from './account.types';
import { toAccountSummary } from './helpers/account-summary';
import type { AccountFlowDeps } from './flows/flow-deps';

import { registerFlow } from './flows/register/register-flow';
import type { RegisterParams } from './flows/register/register-flow';
import { activateFlow } from './flows/activation/activate-flow';
import type { ActivateParams } from './flows/activation/activate-flow';
import { resendActivationFlow } from './flows/activation/resend-activation-flow';
import type { ResendActivationParams } from './flows/activation/resend-activation-flow';
import { requestPasswordResetFlow } from './flows/password-reset/request-password-reset-flow';
import type { RequestPasswordResetParams } from './flows/password-reset/request-password-reset-flow';
import { resetPasswordFlow } from './flows/password-reset/reset-password-flow';
import type { ResetPasswordParams } from './flows/password-reset/reset-password-flow';
import { loginFlow } from './flows/session/login-flow';
import type { LoginParams } from './flows/session/login-flow';
import { refreshFlow } from './flows/session/refresh-flow';
import type { RefreshParams } from './flows/session/refresh-flow';
import { logoutFlow } from './flows/session/logout-flow';
import type { LogoutParams } from './flows/session/logout-flow';
import { changePasswordFlow } from './flows/profile/change-password-flow';
import type { ChangePasswordParams } from './flows/profile/change-password-flow';
import { adminActivateUserFlow } from './flows/admin/admin-activate-user-flow';
import type { AdminActivateUserParams } from './flows/admin/admin-activate-user-flow';
import { adminChangeGroupFlow } from './flows/admin/admin-change-group-flow';
import type { AdminChangeGroupParams } from './flows/admin/admin-change-group-flow';

export class AccountService {
  constructor(private readonly deps: AccountFlowDeps) {}

  // ── Registration & activation ────────────────────────────

  register(params: RegisterParams): Promise<RegisterResponse> {
    return registerFlow(this.deps, params);
  }

  activate(params: ActivateParams): Promise<MessageResponse> {
    return activateFlow(this.deps, params);
  }

  resendActivation(params: ResendActivationParams): Promise<MessageResponse> {
    return resendActivationFlow(this.deps, params);
  }

  // ── Password reset ───────────────────────────────────────

  requestPasswordReset(params: RequestPasswordResetParams): Promise<MessageResponse> {
    return requestPasswordResetFlow(this.deps, params);
  }

  resetPassword(params: ResetPasswordParams): Promise<MessageResponse> {
    return resetPasswordFlow(this.deps, params);
  }

  // ── Sessions ─────────────────────────────────────────────

  login(params: LoginParams): Promise<TokenPairResponse> {
    return loginFlow(this.deps, params);
  }

  refresh(params: RefreshParams): Promise<AccessTokenResponse> {
    return refreshFlow(this.deps, params);
  }

  logout(params: LogoutParams): Promise<MessageResponse> {
    return logoutFlow(this.deps, params);
  }

  // ── Profile ──────────────────────────────────────────────

  async getAccount(userId: number): Promise<AccountSummary> {
    const user = await getUserById(this.deps.db, userId);
    if (!user) throw AccountErrors.userNotFound({ userId });
    return toAccountSummary(user);
  }

  changePassword(params: ChangePasswordParams): Promise<MessageResponse> {
    return changePasswordFlow(this.deps, params);
  }

  // ── Admin ────────────────────────────────────────────────

  adminActivateUser(params: AdminActivateUserParams): Promise<MessageResponse> {
    return adminActivateUserFlow(this.deps, params);
  }

  adminChangeGroup(params: AdminChangeGroupParams): Promise<MessageResponse> {
    return adminChangeGroupFlow(this.deps, params);
  }
}
