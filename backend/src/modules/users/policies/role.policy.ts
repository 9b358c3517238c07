/**
 * backend/src/modules/users/policies/role.policy.ts
 *
 * Groups are ordered: user < moderator < admin.
 * A caller satisfies a requirement when its group ranks at or above it.
 *
 * Pure: no I/O, no AppError.
 */

import type { UserGroup } from '../user.types';

export const GROUP_RANK: Readonly<Record<UserGroup, number>> = {
  user: 0,
  moderator: 1,
  admin: 2,
};

export function roleAtLeast(actual: UserGroup, required: UserGroup): boolean {
  return GROUP_RANK[actual] >= GROUP_RANK[required];
}
