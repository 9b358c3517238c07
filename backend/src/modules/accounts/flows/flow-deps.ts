/**
 * backend/src/modules/accounts/flows/flow-deps.ts
 *
 * Collaborators available to account flows. Each flow takes a Pick<> of what
 * it actually uses, so tests and callers see its real surface.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { TokenHasher } from '../../../shared/security/token-hasher';
import type { PasswordHasher } from '../../../shared/security/password-hasher';
import type { JwtTokenManager } from '../../../shared/security/jwt-token-manager';
import type { Logger } from '../../../shared/logger/logger';
import type { RateLimiter } from '../../../shared/security/rate-limit';
import type { AuditRepo } from '../../../shared/audit/audit.repo';
import type { Queue } from '../../../shared/messaging/queue';
import type { UserRepo } from '../../users';
import type { AccountTokenRepo } from '../dal/account-token.repo';

export type AccountSettings = {
  activationTtlHours: number;
  passwordResetTtlHours: number;
  publicAppUrl: string;
};

export type AccountFlowDeps = {
  db: DbExecutor;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  tokenManager: JwtTokenManager;
  logger: Logger;
  rateLimiter: RateLimiter;
  auditRepo: AuditRepo;
  queue: Queue;
  userRepo: UserRepo;
  tokenRepo: AccountTokenRepo;
  settings: AccountSettings;
};
