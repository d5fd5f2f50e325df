/**
 * src/modules/tenants/use-cases/provision-tenant.ts
 *
 * WHY:
 * - Creating a tenant touches tenants, (optionally) subscriptions and audit_events;
 *   all three commit together or not at all.
 *
 * RULES:
 * - Input is validated by buildNewTenant (DomainRuleError on bad input).
 * - Duplicate subdomain → 409 (checked first, DB UNIQUE is the backstop).
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { Logger } from '../../../shared/logger/logger';
import type { AuditWriter } from '../../../shared/audit/audit.writer';
import { tenantScope } from '../../../shared/db/tenant-scope';
import type { SubscriptionModule } from '../../subscriptions';
import { DEFAULT_TRIAL_DAYS } from '../tenant.constants';
import { TenantErrors } from '../tenant.errors';
import type { Tenant } from '../tenant.types';
import { TenantRepo } from '../dal/tenant.repo';
import { buildNewTenant } from '../helpers/build-new-tenant';
import { getTenantBySubdomain } from '../queries/tenant.queries';

export type ProvisionTenantInput = {
  name: string;
  subdomain: string;
  trialPlanId?: string;
  trialDays?: number;
};

export async function provisionTenant(
  deps: {
    db: DbExecutor;
    logger: Logger;
    subscriptions: SubscriptionModule;
  },
  audit: AuditWriter,
  input: ProvisionTenantInput,
): Promise<Tenant> {
  const now = new Date();
  const newTenant = buildNewTenant({ name: input.name, subdomain: input.subdomain, now });

  await deps.db.transaction().execute(async (trx) => {
    const existing = await getTenantBySubdomain(trx, newTenant.subdomain);
    if (existing) {
      throw TenantErrors.subdomainTaken({ subdomain: newTenant.subdomain });
    }

    await new TenantRepo(trx).insertTenant(newTenant);

    if (input.trialPlanId) {
      await deps.subscriptions.startTrial(trx, tenantScope(newTenant.id), {
        tenantId: newTenant.id,
        planId: input.trialPlanId,
        now,
        trialDays: input.trialDays ?? DEFAULT_TRIAL_DAYS,
      });
    }

    await audit.withDb(trx).withContext({ tenantId: newTenant.id }).append('tenant.created', {
      subdomain: newTenant.subdomain,
      name: newTenant.name,
      trialPlanId: input.trialPlanId ?? null,
    });
  });

  deps.logger.info({
    msg: 'tenant.created',
    flow: 'tenant.provision',
    tenantId: newTenant.id,
    subdomain: newTenant.subdomain,
  });

  return { ...newTenant, updatedAt: newTenant.createdAt };
}
