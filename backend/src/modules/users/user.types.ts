/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for accounts' identities.
 * - Every user belongs to exactly one group; groups double as roles.
 *
 * RULES:
 * - Keep aligned with the DB schema (users + user_groups).
 * - No snake_case outside DAL/queries.
 */

export const USER_GROUPS = ['user', 'moderator', 'admin'] as const;

export type UserGroup = (typeof USER_GROUPS)[number];

export const DEFAULT_USER_GROUP: UserGroup = 'user';

export function isUserGroup(value: string): value is UserGroup {
  return USER_GROUPS.some((group) => group === value);
}

export type UserId = number;

export type User = {
  id: UserId;
  email: string;
  isActive: boolean;
  group: UserGroup;

  createdAt: Date;
  updatedAt: Date;
};

/** Only for credential checks (login, change/reset password). Never serialize. */
export type UserWithPassword = User & {
  hashedPassword: string;
};

export type UserGroupRecord = {
  id: number;
  name: UserGroup;
};
