/**
 * src/modules/tenants/tenant.types.ts
 *
 * WHY:
 * - Domain types for the Tenants module.
 * - Tenant = isolation boundary. Resolved ONLY by subdomain.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export const TENANT_STATUSES = ['ACTIVE', 'SUSPENDED', 'CANCELLED', 'DELETED'] as const;
export type TenantStatus = (typeof TENANT_STATUSES)[number];

export function isTenantStatus(value: unknown): value is TenantStatus {
  return typeof value === 'string' && TENANT_STATUSES.some((s) => s === value);
}

export type TenantId = string;
export type Subdomain = string;

export type Tenant = {
  id: TenantId;
  name: string;
  subdomain: Subdomain;
  status: TenantStatus;

  createdAt: Date;
  updatedAt: Date;
};

/**
 * What the resolver caches. Never the full row.
 */
export type TenantProjection = Readonly<{
  id: TenantId;
  subdomain: Subdomain;
  status: TenantStatus;
}>;

export type NewTenant = Readonly<{
  id: TenantId;
  name: string;
  subdomain: Subdomain;
  status: TenantStatus;
  createdAt: Date;
}>;

export type TenantStatusAction = 'activate' | 'suspend' | 'cancel' | 'markDeleted';
