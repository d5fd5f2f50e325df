/**
 * src/modules/tenants/tenant.constants.ts
 */

/** DNS label: 1-63 chars, lowercase alnum + inner hyphens. */
export const SUBDOMAIN_PATTERN = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/;

/** Subdomains that route to platform services, never to a tenant. */
export const RESERVED_SUBDOMAINS: ReadonlySet<string> = new Set([
  'www',
  'api',
  'admin',
  'app',
  'mail',
  'ftp',
  'cdn',
  'assets',
]);

export const TENANT_NAME_MIN_LENGTH = 2;
export const TENANT_NAME_MAX_LENGTH = 100;

export const TENANT_CACHE_PREFIX = 'tenant';

export function tenantCacheKey(subdomain: string): string {
  return `${TENANT_CACHE_PREFIX}:${subdomain}`;
}

export const DEFAULT_TRIAL_DAYS = 14;
