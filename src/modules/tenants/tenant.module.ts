/**
 * src/modules/tenants/tenant.module.ts
 *
 * WHY:
 * - Single entrypoint for tenant resolution, provisioning and lifecycle.
 * - Other modules call this instead of duplicating tenant logic.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No routes: tenant administration is not exposed over HTTP.
 */

import type { Cache } from '../../shared/cache/cache';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { SubscriptionModule } from '../subscriptions';
import type { Tenant, TenantStatusAction } from './tenant.types';
import { getTenantById, getTenantBySubdomain } from './queries/tenant.queries';
import { createTenantResolver, requireActiveTenant } from './use-cases/resolve-tenant';
import { provisionTenant, type ProvisionTenantInput } from './use-cases/provision-tenant';
import { changeTenantStatus } from './use-cases/change-tenant-status';
import { normalizeSubdomain } from './policies/subdomain.policy';

export type TenantModule = ReturnType<typeof createTenantModule>;

export function createTenantModule(deps: {
  db: DbExecutor;
  cache: Cache;
  logger: Logger;
  subscriptions: SubscriptionModule;
  tenantCacheTtlSeconds: number;
}) {
  const resolveTenant = createTenantResolver({
    db: deps.db,
    cache: deps.cache,
    logger: deps.logger,
    cacheTtlSeconds: deps.tenantCacheTtlSeconds,
  });

  function transition(audit: AuditWriter, tenantId: string, action: TenantStatusAction) {
    return changeTenantStatus(deps, audit, { tenantId, action });
  }

  return {
    resolveTenant,
    requireActiveTenant: (db: DbExecutor, tenantId: string) => requireActiveTenant(db, tenantId),

    getTenantById: (tenantId: string): Promise<Tenant | undefined> =>
      getTenantById(deps.db, tenantId),
    getTenantBySubdomain: (subdomain: string): Promise<Tenant | undefined> =>
      getTenantBySubdomain(deps.db, normalizeSubdomain(subdomain)),

    provisionTenant: (audit: AuditWriter, input: ProvisionTenantInput) =>
      provisionTenant(deps, audit, input),

    activate: (audit: AuditWriter, tenantId: string) => transition(audit, tenantId, 'activate'),
    suspend: (audit: AuditWriter, tenantId: string) => transition(audit, tenantId, 'suspend'),
    cancel: (audit: AuditWriter, tenantId: string) => transition(audit, tenantId, 'cancel'),
    markDeleted: (audit: AuditWriter, tenantId: string) =>
      transition(audit, tenantId, 'markDeleted'),
  };
}
