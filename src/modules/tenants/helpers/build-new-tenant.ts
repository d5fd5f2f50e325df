/**
 * src/modules/tenants/helpers/build-new-tenant.ts
 *
 * WHY:
 * - One place that turns raw input into a valid NewTenant, so no caller can persist
 *   an unnormalized subdomain or an empty name.
 *
 * RULES:
 * - Throws DomainRuleError on invalid input (callers validate request bodies first).
 * - New tenants always start ACTIVE.
 */

import { randomUUID } from 'node:crypto';

import { DomainRuleError } from '../../../shared/http/errors';
import type { NewTenant } from '../tenant.types';
import { getSubdomainCreationFailure, normalizeSubdomain } from '../policies/subdomain.policy';
import { isValidTenantName, normalizeTenantName } from '../policies/tenant-name.policy';

const SUBDOMAIN_FAILURE_MESSAGES = {
  missing: 'Tenant subdomain is required',
  invalid_format: 'Tenant subdomain must be a valid DNS label',
  reserved: 'Tenant subdomain is reserved',
} as const;

export function buildNewTenant(input: {
  name: string;
  subdomain: string;
  now?: Date;
}): NewTenant {
  const name = normalizeTenantName(input.name);
  if (!isValidTenantName(name)) {
    throw new DomainRuleError('Tenant name must be between 2 and 100 characters');
  }

  const subdomain = normalizeSubdomain(input.subdomain);
  const failure = getSubdomainCreationFailure(subdomain);
  if (failure) {
    throw new DomainRuleError(SUBDOMAIN_FAILURE_MESSAGES[failure]);
  }

  return {
    id: randomUUID(),
    name,
    subdomain,
    status: 'ACTIVE',
    createdAt: input.now ?? new Date(),
  };
}
