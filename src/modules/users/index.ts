/**
 * src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 */

export { createUserModule, type UserModule } from './user.module';
export { getUserByEmail, getUserById } from './queries/user.queries';
export { buildNewUser } from './helpers/build-new-user';
export { normalizeEmail, isValidEmail, emailDomain } from './policies/email.policy';
export { isValidPersonName } from './policies/user-name.policy';
export { promoteToAdmin } from './policies/user-role.policy';
export { toUserProfile } from './user.types';
export type { User, NewUser, UserProfile, UserRole } from './user.types';
