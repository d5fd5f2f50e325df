/**
 * src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only. No AppError.
 * - Scope is passed straight through to the DAL.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { TenantScope } from '../../../shared/db/tenant-scope';
import { isUserRole } from '../../../shared/security/access-token';
import type { User, UserRole } from '../user.types';
import { selectUserByEmailSql, selectUserByIdSql, type UserRow } from '../dal/user.query-sql';

function toUserRole(value: string): UserRole {
  if (!isUserRole(value)) {
    throw new Error(`users.role has unexpected value: ${value}`);
  }
  return value;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    email: row.email,
    passwordHash: row.password_hash,
    firstName: row.first_name,
    lastName: row.last_name,
    role: toUserRole(row.role),
    emailVerified: row.email_verified,
    lastLoginAt: row.last_login_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getUserByEmail(
  db: DbExecutor,
  scope: TenantScope,
  email: string,
): Promise<User | undefined> {
  const row = await selectUserByEmailSql(db, scope, email);
  return row ? toUser(row) : undefined;
}

export async function getUserById(
  db: DbExecutor,
  scope: TenantScope,
  userId: string,
): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, scope, userId);
  return row ? toUser(row) : undefined;
}
