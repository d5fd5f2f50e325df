/**
 * src/modules/tenants/policies/subdomain.policy.ts
 *
 * WHY:
 * - The subdomain is the routing key AND a cache key: one canonical form only.
 * - Pure + unit-testable (no DB, no HTTP).
 *
 * RULES:
 * - Normalization = trim + lowercase.
 * - Syntax check applies on resolution and on creation.
 * - Reserved words are rejected only on creation (they can never exist, so lookups just miss).
 */

import { RESERVED_SUBDOMAINS, SUBDOMAIN_PATTERN } from '../tenant.constants';

export type SubdomainFailureReason = 'missing' | 'invalid_format' | 'reserved';

export function normalizeSubdomain(raw: string): string {
  return raw.trim().toLowerCase();
}

export function isValidSubdomainSyntax(subdomain: string): boolean {
  return SUBDOMAIN_PATTERN.test(subdomain);
}

export function isReservedSubdomain(subdomain: string): boolean {
  return RESERVED_SUBDOMAINS.has(subdomain);
}

/**
 * Returns null when the (already normalized) value is usable for a lookup.
 */
export function getSubdomainLookupFailure(
  subdomain: string | null,
): Extract<SubdomainFailureReason, 'missing' | 'invalid_format'> | null {
  if (!subdomain) return 'missing';
  if (!isValidSubdomainSyntax(subdomain)) return 'invalid_format';
  return null;
}

/**
 * Returns null when the value may be assigned to a new tenant.
 */
export function getSubdomainCreationFailure(subdomain: string): SubdomainFailureReason | null {
  const lookupFailure = getSubdomainLookupFailure(subdomain);
  if (lookupFailure) return lookupFailure;
  if (isReservedSubdomain(subdomain)) return 'reserved';
  return null;
}
