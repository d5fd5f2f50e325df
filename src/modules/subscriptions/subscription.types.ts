/**
 * src/modules/subscriptions/subscription.types.ts
 *
 * WHY:
 * - Plans are a global catalog; subscriptions belong to exactly one tenant.
 * - Billing workflows are out of scope: only the state transitions live here.
 *
 * RULES:
 * - Money is integer cents.
 */

export const SUBSCRIPTION_STATUSES = [
  'TRIALING',
  'ACTIVE',
  'PAST_DUE',
  'CANCELLED',
  'EXPIRED',
] as const;
export type SubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];

export function isSubscriptionStatus(value: unknown): value is SubscriptionStatus {
  return typeof value === 'string' && SUBSCRIPTION_STATUSES.some((s) => s === value);
}

export type SubscriptionPlan = Readonly<{
  id: string;
  name: string;
  description: string;
  pricePerMonthCents: number;
  maxUsers: number;
  maxStorageGb: number;
  isActive: boolean;
  stripePriceId: string | null;
  createdAt: Date;
  updatedAt: Date;
}>;

export type Subscription = Readonly<{
  id: string;
  tenantId: string;
  planId: string;
  status: SubscriptionStatus;
  startDate: Date;
  endDate: Date | null;
  cancelledAt: Date | null;
  stripeSubscriptionId: string | null;
  stripeCustomerId: string | null;
  createdAt: Date;
  updatedAt: Date;
}>;
