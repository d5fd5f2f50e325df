/**
 * src/shared/db/tenant-scope.ts
 *
 * WHY:
 * - Tenant isolation must not depend on every query author remembering a WHERE clause.
 * - Every DAL function on a tenant-owned table takes a REQUIRED TenantScope, so forgetting
 *   the tenant is a compile error rather than a data leak.
 *
 * HOW TO USE:
 * - Request handlers: tenantScope(req.tenantContext.tenantId)
 * - Trusted contexts (seed, migrations) and audited cross-tenant checks:
 *     unscoped('refresh token ownership check')
 *
 * RULES:
 * - Tenant-owned tables: users, refresh_tokens (through the owning user), subscriptions.
 * - Global tables (no scope): tenants, subscription_plans, audit_events.
 * - Every unscoped read/write is logged at debug with its reason.
 */

import { logger } from '../logger/logger';

export type TenantScope =
  | Readonly<{ kind: 'tenant'; tenantId: string }>
  | Readonly<{ kind: 'unscoped'; reason: string }>;

export function tenantScope(tenantId: string): TenantScope {
  if (!tenantId) throw new Error('tenantScope requires a tenant id');
  return { kind: 'tenant', tenantId };
}

export function unscoped(reason: string): TenantScope {
  if (!reason.trim()) throw new Error('unscoped access requires a reason');
  return { kind: 'unscoped', reason };
}

/**
 * Returns the tenant id the query must be restricted to, or null for an explicit opt-out.
 * DAL functions call this exactly once per query.
 */
export function scopeFilter(scope: TenantScope, table: string): string | null {
  if (scope.kind === 'tenant') return scope.tenantId;

  logger.debug('db.tenant_scope.unscoped', {
    flow: 'db.tenant_scope',
    table,
    reason: scope.reason,
  });
  return null;
}

/** True when a row owned by `ownerTenantId` is visible through `scope`. */
export function isVisibleInScope(scope: TenantScope, ownerTenantId: string): boolean {
  return scope.kind === 'unscoped' || scope.tenantId === ownerTenantId;
}
