/**
 * src/modules/subscriptions/policies/plan.policy.ts
 *
 * Pure plan rules. Invalid input is a DomainRuleError (catalog is admin/seed managed).
 */

import { randomUUID } from 'node:crypto';

import { DomainRuleError } from '../../../shared/http/errors';
import type { SubscriptionPlan } from '../subscription.types';

export function buildNewPlan(
  input: {
    name: string;
    description?: string;
    pricePerMonthCents: number;
    maxUsers: number;
    maxStorageGb: number;
    stripePriceId?: string | null;
  },
  now: Date = new Date(),
): SubscriptionPlan {
  if (!input.name.trim()) throw new DomainRuleError('Plan name cannot be empty');
  assertValidPrice(input.pricePerMonthCents);
  if (!Number.isInteger(input.maxUsers) || input.maxUsers <= 0) {
    throw new DomainRuleError('Max users must be greater than zero');
  }
  if (!Number.isInteger(input.maxStorageGb) || input.maxStorageGb <= 0) {
    throw new DomainRuleError('Max storage must be greater than zero');
  }

  return {
    id: randomUUID(),
    name: input.name.trim(),
    description: input.description ?? '',
    pricePerMonthCents: input.pricePerMonthCents,
    maxUsers: input.maxUsers,
    maxStorageGb: input.maxStorageGb,
    isActive: true,
    stripePriceId: input.stripePriceId ?? null,
    createdAt: now,
    updatedAt: now,
  };
}

function assertValidPrice(cents: number): void {
  if (!Number.isInteger(cents) || cents < 0) {
    throw new DomainRuleError('Price per month cannot be negative');
  }
}

/** Keeps the previous Stripe price id when none (or an empty one) is given. */
export function updatePlanPricing(
  plan: SubscriptionPlan,
  input: { pricePerMonthCents: number; stripePriceId?: string | null },
  now: Date = new Date(),
): SubscriptionPlan {
  assertValidPrice(input.pricePerMonthCents);

  return {
    ...plan,
    pricePerMonthCents: input.pricePerMonthCents,
    stripePriceId: input.stripePriceId ? input.stripePriceId : plan.stripePriceId,
    updatedAt: now,
  };
}

export function activatePlan(plan: SubscriptionPlan, now: Date = new Date()): SubscriptionPlan {
  return { ...plan, isActive: true, updatedAt: now };
}

export function deactivatePlan(plan: SubscriptionPlan, now: Date = new Date()): SubscriptionPlan {
  return { ...plan, isActive: false, updatedAt: now };
}
