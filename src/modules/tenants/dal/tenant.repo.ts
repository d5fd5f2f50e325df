/**
 * src/modules/tenants/dal/tenant.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for tenants (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError. No policies.
 * - Supports withDb() for transaction binding (same pattern as AuditRepo).
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { NewTenant, TenantStatus } from '../tenant.types';

export class TenantRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): TenantRepo {
    return new TenantRepo(db);
  }

  async insertTenant(tenant: NewTenant): Promise<void> {
    await this.db
      .insertInto('tenants')
      .values({
        id: tenant.id,
        name: tenant.name,
        subdomain: tenant.subdomain,
        status: tenant.status,
        created_at: tenant.createdAt,
        updated_at: tenant.createdAt,
      })
      .execute();
  }

  /**
   * Compare-and-set on status. Returns false when the row moved under us.
   */
  async updateStatus(params: {
    tenantId: string;
    from: TenantStatus;
    to: TenantStatus;
    now: Date;
  }): Promise<boolean> {
    const rows = await this.db
      .updateTable('tenants')
      .set({ status: params.to, updated_at: params.now })
      .where('id', '=', params.tenantId)
      .where('status', '=', params.from)
      .returning(['id'])
      .execute();

    return rows.length > 0;
  }
}
