/**
 * src/modules/subscriptions/subscription.module.ts
 *
 * WHY:
 * - Support module (no routes): tenants provisioning and the dev seed consume it.
 * - Loads → applies a pure transition → persists. No billing workflow.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - Caller owns the transaction: every operation accepts an executor.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { TenantScope } from '../../shared/db/tenant-scope';
import { PlanRepo } from './dal/plan.repo';
import { SubscriptionRepo } from './dal/subscription.repo';
import {
  activateSubscription,
  buildTrialSubscription,
  cancelSubscription,
  markSubscriptionPastDue,
} from './policies/subscription.policy';
import { getSubscriptionForTenant } from './queries/subscription.queries';
import type { Subscription } from './subscription.types';

type Transition = (sub: Subscription, now: Date) => Subscription;

export type SubscriptionModule = ReturnType<typeof createSubscriptionModule>;

export function createSubscriptionModule(deps: { db: DbExecutor }) {
  const planRepo = new PlanRepo(deps.db);
  const subscriptionRepo = new SubscriptionRepo(deps.db);

  async function startTrial(
    trx: DbExecutor,
    scope: TenantScope,
    input: { tenantId: string; planId: string; now: Date; trialDays?: number },
  ): Promise<Subscription> {
    const sub = buildTrialSubscription(input);
    await subscriptionRepo.withDb(trx).insertSubscription(scope, sub);
    return sub;
  }

  async function applyTransition(
    trx: DbExecutor,
    scope: TenantScope,
    tenantId: string,
    transition: Transition,
    now: Date,
  ): Promise<Subscription | undefined> {
    const current = await getSubscriptionForTenant(trx, scope, tenantId);
    if (!current) return undefined;

    const next = transition(current, now);
    if (next !== current) {
      await subscriptionRepo.withDb(trx).saveSubscription(scope, next);
    }
    return next;
  }

  return {
    planRepo,
    subscriptionRepo,
    startTrial,
    getForTenant: (db: DbExecutor, scope: TenantScope, tenantId: string) =>
      getSubscriptionForTenant(db, scope, tenantId),
    activate: (trx: DbExecutor, scope: TenantScope, tenantId: string, now: Date) =>
      applyTransition(trx, scope, tenantId, activateSubscription, now),
    cancel: (trx: DbExecutor, scope: TenantScope, tenantId: string, now: Date) =>
      applyTransition(trx, scope, tenantId, cancelSubscription, now),
    markPastDue: (trx: DbExecutor, scope: TenantScope, tenantId: string, now: Date) =>
      applyTransition(trx, scope, tenantId, markSubscriptionPastDue, now),
  };
}
