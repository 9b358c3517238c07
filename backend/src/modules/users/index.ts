/**
 * backend/src/modules/users/index.ts
 *
 * Public surface of the users module. Other modules import from here,
 * never from users/dal or users/queries directly.
 */

export {
  getUserByEmail,
  getUserById,
  getUserWithPasswordByEmail,
  getUserWithPasswordById,
  getUserGroupByName,
} from './queries/user.queries';
export { roleAtLeast, GROUP_RANK } from './policies/role.policy';
export { USER_GROUPS, DEFAULT_USER_GROUP, isUserGroup } from './user.types';
export type { User, UserGroup, UserId, UserWithPassword, UserGroupRecord } from './user.types';
export type { UserRepo } from './dal/user.repo';
