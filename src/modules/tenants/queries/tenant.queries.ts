/**
 * src/modules/tenants/queries/tenant.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into Tenant domain types.
 *
 * RULES:
 * - Read-only. No AppError.
 * - A row with an unknown status is a schema drift bug: fail loudly.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { isTenantStatus, type Tenant, type TenantStatus } from '../tenant.types';
import {
  selectTenantByIdSql,
  selectTenantBySubdomainSql,
  type TenantRow,
} from '../dal/tenant.query-sql';

function toTenantStatus(value: string): TenantStatus {
  if (!isTenantStatus(value)) {
    throw new Error(`tenants.status has unexpected value: ${value}`);
  }
  return value;
}

function toTenant(row: TenantRow): Tenant {
  return {
    id: row.id,
    name: row.name,
    subdomain: row.subdomain,
    status: toTenantStatus(row.status),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getTenantBySubdomain(
  db: DbExecutor,
  subdomain: string,
): Promise<Tenant | undefined> {
  const row = await selectTenantBySubdomainSql(db, subdomain);
  return row ? toTenant(row) : undefined;
}

export async function getTenantById(
  db: DbExecutor,
  tenantId: string,
): Promise<Tenant | undefined> {
  const row = await selectTenantByIdSql(db, tenantId);
  return row ? toTenant(row) : undefined;
}
