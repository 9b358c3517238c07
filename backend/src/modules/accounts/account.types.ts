/**
 * src/modules/accounts/account.types.ts
 *
 * WHY:
 * - Domain types for token records and the API response shapes.
 *
 * RULES:
 * - Token records carry the hash only; raw values never leave the flow that made them.
 * - Response types use the snake_case wire format.
 */

import type { UserGroup } from '../users/user.types';
import type { TOKEN_TYPE } from './account.constants';

/** Activation or password-reset token row (at most one per user per kind). */
export type OneTimeToken = {
  id: number;
  userId: number;
  tokenHash: string;
  expiresAt: Date;
  createdAt: Date;
};

/** Activation token joined with the owning user's state. */
export type ActivationTokenMatch = OneTimeToken & {
  email: string;
  userIsActive: boolean;
};

export type RefreshTokenRecord = {
  id: number;
  userId: number;
  tokenHash: string;
  expiresAt: Date;
  createdAt: Date;
};

/** Request-level data every flow receives for logs and audit rows. */
export type RequestMeta = {
  requestId: string;
  ip: string | null;
  userAgent: string | null;
};

// ── Responses ───────────────────────────────────────────────

export type MessageResponse = { message: string };

export type RegisterResponse = { id: number; email: string };

export type TokenPairResponse = {
  access_token: string;
  refresh_token: string;
  token_type: typeof TOKEN_TYPE;
};

export type AccessTokenResponse = {
  access_token: string;
  token_type: typeof TOKEN_TYPE;
};

export type AccountSummary = {
  id: number;
  email: string;
  is_active: boolean;
  group: UserGroup;
  created_at: string;
};
