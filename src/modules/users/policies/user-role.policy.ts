/**
 * src/modules/users/policies/user-role.policy.ts
 *
 * RULES:
 * - New users are USER unless a trusted caller (seed) says otherwise.
 * - SUPER_ADMIN is platform-level and is never demoted by a promotion.
 */

import { DomainRuleError } from '../../../shared/http/errors';
import type { UserRole } from '../user.types';

export const DEFAULT_USER_ROLE: UserRole = 'USER';

export function promoteToAdmin(current: UserRole): UserRole {
  if (current === 'SUPER_ADMIN') {
    throw new DomainRuleError('Cannot promote a super admin');
  }
  return 'ADMIN';
}
