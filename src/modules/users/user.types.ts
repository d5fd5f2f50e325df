/**
 * src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - Users are tenant-owned: the same email may exist once per tenant.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - passwordHash never leaves the auth flows (UserProfile has none).
 */

import type { UserRole } from '../../shared/security/access-token';

export type { UserRole } from '../../shared/security/access-token';

export type UserId = string;

export type User = Readonly<{
  id: UserId;
  tenantId: string;
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  emailVerified: boolean;
  lastLoginAt: Date | null;

  createdAt: Date;
  updatedAt: Date;
}>;

export type NewUser = Readonly<{
  id: UserId;
  tenantId: string;
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  emailVerified: boolean;
  createdAt: Date;
}>;

/** Public shape returned by the API. */
export type UserProfile = Readonly<{
  id: UserId;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  tenantId: string;
  emailVerified: boolean;
}>;

export function toUserProfile(user: User | NewUser): UserProfile {
  return {
    id: user.id,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    role: user.role,
    tenantId: user.tenantId,
    emailVerified: user.emailVerified,
  };
}
