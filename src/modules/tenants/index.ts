/**
 * src/modules/tenants/index.ts
 *
 * WHY:
 * - Define the public surface of the tenants module.
 * - Prevent cross-module coupling via deep imports into /queries or /policies.
 */

export { createTenantModule, type TenantModule } from './tenant.module';
export { requireActiveTenant, type ActiveTenantFailure } from './use-cases/resolve-tenant';
export type { Tenant, TenantStatus } from './tenant.types';
