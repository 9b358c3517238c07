/**
 * backend/src/modules/accounts/helpers/account-summary.ts
 *
 * Wire shape of an account for GET /accounts/me and the moderator lookup.
 * The password hash never leaves the users module through this path.
 */

import type { User } from '../../users';
import type { AccountSummary } from '../account.types';

export function toAccountSummary(user: User): AccountSummary {
  return {
    id: user.id,
    email: user.email,
    is_active: user.isActive,
    group: user.group,
    created_at: user.createdAt.toISOString(),
  };
}
