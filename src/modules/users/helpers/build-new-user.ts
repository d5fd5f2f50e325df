/**
 * src/modules/users/helpers/build-new-user.ts
 *
 * WHY:
 * - Single factory for user rows, so every insert carries a normalized email and a hash.
 *
 * RULES:
 * - Receives an already-hashed password; an empty hash is a programming error (throws).
 * - Email/name format is validated by the caller (request schema); this guards invariants only.
 */

import { randomUUID } from 'node:crypto';

import { DomainRuleError } from '../../../shared/http/errors';
import type { NewUser, UserRole } from '../user.types';
import { isValidEmail, normalizeEmail } from '../policies/email.policy';
import { DEFAULT_USER_ROLE } from '../policies/user-role.policy';

export function buildNewUser(input: {
  tenantId: string;
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  role?: UserRole;
  now?: Date;
}): NewUser {
  if (!input.tenantId) throw new DomainRuleError('User must belong to a tenant');
  if (!input.passwordHash || !input.passwordHash.trim()) {
    throw new DomainRuleError('Password hash cannot be empty');
  }
  if (!isValidEmail(input.email)) throw new DomainRuleError('Invalid email format');

  return {
    id: randomUUID(),
    tenantId: input.tenantId,
    email: normalizeEmail(input.email),
    passwordHash: input.passwordHash,
    firstName: input.firstName.trim(),
    lastName: input.lastName.trim(),
    role: input.role ?? DEFAULT_USER_ROLE,
    emailVerified: false,
    createdAt: input.now ?? new Date(),
  };
}
