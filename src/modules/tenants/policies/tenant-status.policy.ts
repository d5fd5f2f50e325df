/**
 * src/modules/tenants/policies/tenant-status.policy.ts
 *
 * WHY:
 * - Tenant lifecycle is a small state machine; keep it pure so every edge is unit-tested.
 *
 * RULES:
 * - activate:    SUSPENDED → ACTIVE
 * - suspend:     ACTIVE → SUSPENDED
 * - cancel:      ACTIVE | SUSPENDED → CANCELLED
 * - markDeleted: anything but DELETED → DELETED
 * - Same-state transitions are no-ops (changed = false).
 * - Everything else is rejected.
 */

import { err, ok, type Result } from '../../../shared/result';
import type { TenantStatus, TenantStatusAction } from '../tenant.types';

export type TenantStatusTransition = Readonly<{
  from: TenantStatus;
  to: TenantStatus;
  changed: boolean;
}>;

export type TenantStatusTransitionFailure = Readonly<{
  reason: 'invalid_transition';
  from: TenantStatus;
  action: TenantStatusAction;
}>;

const TARGET_BY_ACTION: Readonly<Record<TenantStatusAction, TenantStatus>> = {
  activate: 'ACTIVE',
  suspend: 'SUSPENDED',
  cancel: 'CANCELLED',
  markDeleted: 'DELETED',
};

const ALLOWED_SOURCES: Readonly<Record<TenantStatusAction, readonly TenantStatus[]>> = {
  activate: ['SUSPENDED'],
  suspend: ['ACTIVE'],
  cancel: ['ACTIVE', 'SUSPENDED'],
  markDeleted: ['ACTIVE', 'SUSPENDED', 'CANCELLED'],
};

export function planTenantStatusTransition(
  current: TenantStatus,
  action: TenantStatusAction,
): Result<TenantStatusTransition, TenantStatusTransitionFailure> {
  const target = TARGET_BY_ACTION[action];

  if (current === target) {
    return ok({ from: current, to: target, changed: false });
  }

  if (!ALLOWED_SOURCES[action].includes(current)) {
    return err({ reason: 'invalid_transition', from: current, action });
  }

  return ok({ from: current, to: target, changed: true });
}

export function isTenantActive(status: TenantStatus): boolean {
  return status === 'ACTIVE';
}
