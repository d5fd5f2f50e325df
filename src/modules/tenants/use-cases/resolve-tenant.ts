/**
 * src/modules/tenants/use-cases/resolve-tenant.ts
 *
 * WHY:
 * - Every tenant-scoped request starts here; it must be fast and fail closed.
 * - A cache-first lookup keeps the hot path off the database.
 *
 * HOW IT WORKS:
 * 1. normalize (trim + lowercase) → assert present + valid syntax
 * 2. cache `tenant:{subdomain}` → parse projection (corrupt entry = miss)
 * 3. miss → DB → cache the projection {id, subdomain, status}
 * 4. assert exists + ACTIVE (same checks for both paths)
 *
 * RULES:
 * - Only the projection is cached, never the full row.
 * - Concurrent misses may both write the cache (last write wins, bounded by TTL).
 */

import { z } from 'zod';

import type { Cache } from '../../../shared/cache/cache';
import type { DbExecutor } from '../../../shared/db/db';
import type { Logger } from '../../../shared/logger/logger';
import type { TenantResolver } from '../../../shared/http/tenant-context';
import { err, ok, type Result } from '../../../shared/result';
import { tenantCacheKey } from '../tenant.constants';
import { TENANT_STATUSES, type Tenant, type TenantProjection } from '../tenant.types';
import { getTenantById, getTenantBySubdomain } from '../queries/tenant.queries';
import { normalizeSubdomain } from '../policies/subdomain.policy';
import { isTenantActive } from '../policies/tenant-status.policy';
import { assertResolvableTenant, assertSubdomainUsable } from '../policies/tenant-safety.policy';

const ProjectionSchema = z.object({
  id: z.string().min(1),
  subdomain: z.string().min(1),
  status: z.enum(TENANT_STATUSES),
});

export function parseCachedProjection(raw: string): TenantProjection | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = ProjectionSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export type TenantLookupDeps = {
  db: DbExecutor;
  cache: Cache;
  logger: Logger;
  cacheTtlSeconds: number;
};

async function lookupProjection(
  deps: TenantLookupDeps,
  subdomain: string,
): Promise<TenantProjection | undefined> {
  const key = tenantCacheKey(subdomain);
  const cached = await deps.cache.get(key);

  if (cached !== null) {
    const projection = parseCachedProjection(cached);
    if (projection) {
      deps.logger.debug({ msg: 'tenant.resolve.cache_hit', flow: 'tenant.resolve', subdomain });
      return projection;
    }
    deps.logger.warn({ msg: 'tenant.resolve.cache_corrupt', flow: 'tenant.resolve', subdomain });
  }

  const tenant = await getTenantBySubdomain(deps.db, subdomain);
  if (!tenant) return undefined;

  const projection: TenantProjection = {
    id: tenant.id,
    subdomain: tenant.subdomain,
    status: tenant.status,
  };
  await deps.cache.set(key, JSON.stringify(projection), { ttlSeconds: deps.cacheTtlSeconds });

  deps.logger.debug({ msg: 'tenant.resolve.cache_miss', flow: 'tenant.resolve', subdomain });
  return projection;
}

/**
 * Builds the resolver the tenant-context hook calls on every request.
 * Throws TenantErrors (400/404/403) on failure.
 */
export function createTenantResolver(deps: TenantLookupDeps): TenantResolver {
  return async (tenantKey) => {
    const subdomain = tenantKey === null ? null : normalizeSubdomain(tenantKey);
    assertSubdomainUsable(subdomain);

    const projection = await lookupProjection(deps, subdomain);
    assertResolvableTenant(projection, subdomain);

    return { tenantId: projection.id, subdomain: projection.subdomain };
  };
}

export type ActiveTenantFailure = 'tenant_not_found' | 'tenant_inactive';

/**
 * Storage re-check used inside write flows (register): the cached projection
 * may be up to one TTL old.
 */
export async function requireActiveTenant(
  db: DbExecutor,
  tenantId: string,
): Promise<Result<Tenant, ActiveTenantFailure>> {
  const tenant = await getTenantById(db, tenantId);
  if (!tenant) return err('tenant_not_found');
  if (!isTenantActive(tenant.status)) return err('tenant_inactive');
  return ok(tenant);
}
