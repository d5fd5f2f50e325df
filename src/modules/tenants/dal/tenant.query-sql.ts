/**
 * src/modules/tenants/dal/tenant.query-sql.ts
 *
 * DAL READS ONLY
 * - No AppError
 * - No policies
 * - No transactions started here
 * - tenants is a global table: no TenantScope
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { TenantsTable } from '../../../shared/db/database.schema';

export type TenantRow = Selectable<TenantsTable>;

export async function selectTenantBySubdomainSql(
  db: DbExecutor,
  subdomain: string,
): Promise<TenantRow | undefined> {
  return db.selectFrom('tenants').selectAll().where('subdomain', '=', subdomain).executeTakeFirst();
}

export async function selectTenantByIdSql(
  db: DbExecutor,
  tenantId: string,
): Promise<TenantRow | undefined> {
  return db.selectFrom('tenants').selectAll().where('id', '=', tenantId).executeTakeFirst();
}
