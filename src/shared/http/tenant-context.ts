/**
 * src/shared/http/tenant-context.ts
 *
 * WHY:
 * - Every tenant-scoped operation needs the resolved tenant id, not the raw subdomain.
 * - Resolution must happen BEFORE any handler runs, and fail closed.
 *
 * HOW IT WORKS:
 * 1. registerTenantContext() sets the unresolved stub on every request.
 * 2. For non-infrastructure paths it calls the injected resolver with requestContext.tenantKey.
 * 3. The resolver throws AppError (400/404/403) on failure → error handler responds.
 * 4. On success req.tenantContext is set ONCE and is read-only afterwards.
 *
 * RULES:
 * - Runs AFTER registerRequestContext (needs tenantKey).
 * - No module imports here (shared stays module-agnostic): the resolver is injected.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

export type TenantContext = Readonly<{
  tenantId: string | null;
  subdomain: string | null;
  isResolved: boolean;
}>;

export type ResolvedTenantContext = Readonly<{
  tenantId: string;
  subdomain: string;
  isResolved: true;
}>;

export type TenantResolver = (
  tenantKey: string | null,
) => Promise<{ tenantId: string; subdomain: string }>;

declare module 'fastify' {
  interface FastifyRequest {
    tenantContext: TenantContext;
  }
}

const UNRESOLVED: TenantContext = Object.freeze({
  tenantId: null,
  subdomain: null,
  isResolved: false,
});

/** Infrastructure paths (and their sub-paths) that never require a tenant. */
export const TENANT_BYPASS_PATHS = ['/health', '/docs', '/swagger', '/favicon.ico'] as const;

export function isTenantBypassPath(url: string): boolean {
  const path = (url.split('?')[0] ?? '').toLowerCase();
  return TENANT_BYPASS_PATHS.some((base) => path === base || path.startsWith(`${base}/`));
}

export function registerTenantContext(app: FastifyInstance, resolve: TenantResolver): void {
  app.decorateRequest('tenantContext', null);

  app.addHook('onRequest', async (req: FastifyRequest) => {
    req.tenantContext = UNRESOLVED;

    if (isTenantBypassPath(req.url)) return;

    const resolved = await resolve(req.requestContext.tenantKey);

    req.tenantContext = Object.freeze({
      tenantId: resolved.tenantId,
      subdomain: resolved.subdomain,
      isResolved: true,
    });
  });
}

/**
 * Narrowing helper for controllers. The hook guarantees resolution for every
 * non-bypass route, so an unresolved context here is a wiring bug.
 */
export function requireTenantContext(req: FastifyRequest): ResolvedTenantContext {
  const ctx = req.tenantContext;
  if (!ctx || !ctx.isResolved || !ctx.tenantId || !ctx.subdomain) {
    throw new Error('tenant context not resolved for a tenant-scoped route');
  }
  return { tenantId: ctx.tenantId, subdomain: ctx.subdomain, isResolved: true };
}
