/**
 * src/modules/tenants/use-cases/change-tenant-status.ts
 *
 * WHY:
 * - Suspending a tenant must take effect on the very next request, so the
 *   resolver's cache entry is dropped after the change commits.
 *
 * RULES:
 * - Transition rules live in tenant-status.policy (pure).
 * - Same-state requests are no-ops: no write, no audit, no invalidation.
 * - Status is written compare-and-set; a concurrent change → 409.
 */

import type { Cache } from '../../../shared/cache/cache';
import type { DbExecutor } from '../../../shared/db/db';
import type { Logger } from '../../../shared/logger/logger';
import type { AuditWriter } from '../../../shared/audit/audit.writer';
import { tenantCacheKey } from '../tenant.constants';
import { TenantErrors } from '../tenant.errors';
import type { Tenant, TenantStatusAction } from '../tenant.types';
import { TenantRepo } from '../dal/tenant.repo';
import { getTenantById } from '../queries/tenant.queries';
import { planTenantStatusTransition } from '../policies/tenant-status.policy';

export async function changeTenantStatus(
  deps: { db: DbExecutor; cache: Cache; logger: Logger },
  audit: AuditWriter,
  input: { tenantId: string; action: TenantStatusAction },
): Promise<Tenant> {
  const now = new Date();

  const updated = await deps.db.transaction().execute(async (trx): Promise<Tenant | null> => {
    const tenant = await getTenantById(trx, input.tenantId);
    if (!tenant) throw TenantErrors.tenantNotFound({ tenantId: input.tenantId });

    const plan = planTenantStatusTransition(tenant.status, input.action);
    if (!plan.ok) {
      throw TenantErrors.invalidStatusTransition({
        tenantId: tenant.id,
        from: plan.error.from,
        action: plan.error.action,
      });
    }
    if (!plan.value.changed) return null;

    const written = await new TenantRepo(trx).updateStatus({
      tenantId: tenant.id,
      from: plan.value.from,
      to: plan.value.to,
      now,
    });
    if (!written) {
      throw TenantErrors.invalidStatusTransition({ tenantId: tenant.id, reason: 'concurrent_change' });
    }

    await audit.withDb(trx).withContext({ tenantId: tenant.id }).append('tenant.status_changed', {
      action: input.action,
      from: plan.value.from,
      to: plan.value.to,
    });

    return { ...tenant, status: plan.value.to, updatedAt: now };
  });

  if (!updated) {
    const current = await getTenantById(deps.db, input.tenantId);
    if (!current) throw TenantErrors.tenantNotFound({ tenantId: input.tenantId });
    return current;
  }

  await deps.cache.del(tenantCacheKey(updated.subdomain));

  deps.logger.info({
    msg: 'tenant.status_changed',
    flow: 'tenant.status',
    tenantId: updated.id,
    subdomain: updated.subdomain,
    status: updated.status,
  });

  return updated;
}
