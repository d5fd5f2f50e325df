/**
 * src/modules/tenants/policies/tenant-name.policy.ts
 *
 * Display name rule: trimmed, 2-100 chars.
 */

import { TENANT_NAME_MAX_LENGTH, TENANT_NAME_MIN_LENGTH } from '../tenant.constants';

export function normalizeTenantName(raw: string): string {
  return raw.trim();
}

export function isValidTenantName(name: string): boolean {
  const trimmed = normalizeTenantName(name);
  return trimmed.length >= TENANT_NAME_MIN_LENGTH && trimmed.length <= TENANT_NAME_MAX_LENGTH;
}
