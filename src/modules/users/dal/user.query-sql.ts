/**
 * src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 * - Users are tenant-owned: every read takes a TenantScope.
 *
 * RULES:
 * - No AppError. No policies. No transactions started here.
 * - Email is compared in normalized form.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/database.schema';
import { scopeFilter, type TenantScope } from '../../../shared/db/tenant-scope';

export type UserRow = Selectable<UsersTable>;

export async function selectUserByEmailSql(
  db: DbExecutor,
  scope: TenantScope,
  email: string,
): Promise<UserRow | undefined> {
  let query = db.selectFrom('users').selectAll().where('email', '=', email.trim().toLowerCase());

  const tenantId = scopeFilter(scope, 'users');
  if (tenantId !== null) query = query.where('tenant_id', '=', tenantId);

  return query.executeTakeFirst();
}

export async function selectUserByIdSql(
  db: DbExecutor,
  scope: TenantScope,
  userId: string,
): Promise<UserRow | undefined> {
  let query = db.selectFrom('users').selectAll().where('id', '=', userId);

  const tenantId = scopeFilter(scope, 'users');
  if (tenantId !== null) query = query.where('tenant_id', '=', tenantId);

  return query.executeTakeFirst();
}
