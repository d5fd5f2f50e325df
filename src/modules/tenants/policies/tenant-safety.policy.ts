/**
 * src/modules/tenants/policies/tenant-safety.policy.ts
 *
 * Tenant resolution gate (fail closed):
 * - Pure (no DB / no I/O)
 * - Throws AppError via TenantErrors
 *
 * Order (LOCKED): present → format → exists → active.
 * The same checks run for cache hits and store reads.
 */

import { TenantErrors } from '../tenant.errors';
import type { TenantProjection, TenantStatus } from '../tenant.types';
import { getSubdomainLookupFailure } from './subdomain.policy';
import { isTenantActive } from './tenant-status.policy';

export function assertSubdomainUsable(subdomain: string | null): asserts subdomain is string {
  const failure = getSubdomainLookupFailure(subdomain);
  if (failure === 'missing') throw TenantErrors.subdomainMissing();
  if (failure === 'invalid_format') throw TenantErrors.subdomainInvalid({ subdomain });
}

export function assertTenantExists<T extends { id: string }>(
  tenant: T | undefined,
  subdomain: string,
): asserts tenant is T {
  if (!tenant) {
    throw TenantErrors.tenantNotFound({ subdomain });
  }
}

export function assertTenantIsActive(tenant: { id: string; subdomain: string; status: TenantStatus }): void {
  if (!isTenantActive(tenant.status)) {
    throw TenantErrors.tenantInactive({
      tenantId: tenant.id,
      subdomain: tenant.subdomain,
      status: tenant.status,
    });
  }
}

export function assertResolvableTenant(
  projection: TenantProjection | undefined,
  subdomain: string,
): asserts projection is TenantProjection {
  assertTenantExists(projection, subdomain);
  assertTenantIsActive(projection);
}
