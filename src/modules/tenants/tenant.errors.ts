/**
 * src/modules/tenants/tenant.errors.ts
 *
 * WHY:
 * - Tenants module owns its domain semantics.
 * - Keeps shared/http/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Put tenant-specific meaning here: messages + safe meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const TenantErrors = {
  subdomainMissing(meta?: AppErrorMeta) {
    return AppError.validationError('Tenant subdomain not provided.', meta);
  },

  subdomainInvalid(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid tenant subdomain format.', meta);
  },

  tenantNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Tenant not found.', meta);
  },

  tenantInactive(meta?: AppErrorMeta) {
    return AppError.forbidden('Tenant is not active.', meta);
  },

  subdomainTaken(meta?: AppErrorMeta) {
    return AppError.conflict('A tenant with this subdomain already exists.', meta);
  },

  invalidStatusTransition(meta?: AppErrorMeta) {
    return AppError.conflict('Tenant status transition is not allowed.', meta);
  },
} as const;
