/**
 * src/modules/subscriptions/policies/subscription.policy.ts
 *
 * WHY:
 * - Subscription state transitions are tiny but easy to get wrong; keep them pure.
 *
 * RULES:
 * - Trial: TRIALING, ends trialDays after start.
 * - Paid: ACTIVE, carries the Stripe ids, open ended.
 * - activate: CANCELLED → throws; ACTIVE → no-op; otherwise ACTIVE.
 * - cancel: idempotent; sets cancelledAt and endDate to now.
 * - markPastDue: only from ACTIVE.
 */

import { randomUUID } from 'node:crypto';

import { DomainRuleError } from '../../../shared/http/errors';
import type { Subscription, SubscriptionStatus } from '../subscription.types';

const DAY_MS = 24 * 60 * 60 * 1000;

export function buildTrialSubscription(input: {
  tenantId: string;
  planId: string;
  now: Date;
  trialDays?: number;
}): Subscription {
  const trialDays = input.trialDays ?? 14;
  if (!Number.isInteger(trialDays) || trialDays <= 0) {
    throw new DomainRuleError('Trial days must be greater than zero');
  }

  return {
    id: randomUUID(),
    tenantId: input.tenantId,
    planId: input.planId,
    status: 'TRIALING',
    startDate: input.now,
    endDate: new Date(input.now.getTime() + trialDays * DAY_MS),
    cancelledAt: null,
    stripeSubscriptionId: null,
    stripeCustomerId: null,
    createdAt: input.now,
    updatedAt: input.now,
  };
}

export function buildPaidSubscription(input: {
  tenantId: string;
  planId: string;
  now: Date;
  stripeSubscriptionId: string;
  stripeCustomerId: string;
}): Subscription {
  if (!input.stripeSubscriptionId || !input.stripeCustomerId) {
    throw new DomainRuleError('Paid subscriptions require Stripe identifiers');
  }

  return {
    id: randomUUID(),
    tenantId: input.tenantId,
    planId: input.planId,
    status: 'ACTIVE',
    startDate: input.now,
    endDate: null,
    cancelledAt: null,
    stripeSubscriptionId: input.stripeSubscriptionId,
    stripeCustomerId: input.stripeCustomerId,
    createdAt: input.now,
    updatedAt: input.now,
  };
}

export function activateSubscription(sub: Subscription, now: Date): Subscription {
  if (sub.status === 'CANCELLED') {
    throw new DomainRuleError('Cannot activate a cancelled subscription');
  }
  if (sub.status === 'ACTIVE') return sub;

  return { ...sub, status: 'ACTIVE', updatedAt: now };
}

export function cancelSubscription(sub: Subscription, now: Date): Subscription {
  if (sub.status === 'CANCELLED') return sub;

  return { ...sub, status: 'CANCELLED', cancelledAt: now, endDate: now, updatedAt: now };
}

export function markSubscriptionPastDue(sub: Subscription, now: Date): Subscription {
  if (sub.status !== 'ACTIVE') {
    throw new DomainRuleError('Only active subscriptions can be marked as past due');
  }

  return { ...sub, status: 'PAST_DUE', updatedAt: now };
}

export function isSubscriptionActive(status: SubscriptionStatus): boolean {
  return status === 'ACTIVE' || status === 'TRIALING';
}
