/**
 * src/modules/subscriptions/queries/subscription.queries.ts
 *
 * Read-only. Shapes rows into domain types (cents stay integers).
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { TenantScope } from '../../../shared/db/tenant-scope';
import {
  isSubscriptionStatus,
  type Subscription,
  type SubscriptionPlan,
  type SubscriptionStatus,
} from '../subscription.types';
import {
  selectActivePlansSql,
  selectPlanByIdSql,
  selectPlanByNameSql,
  type PlanRow,
} from '../dal/plan.query-sql';
import {
  selectSubscriptionByTenantIdSql,
  type SubscriptionRow,
} from '../dal/subscription.query-sql';

function toStatus(value: string): SubscriptionStatus {
  if (!isSubscriptionStatus(value)) {
    throw new Error(`subscriptions.status has unexpected value: ${value}`);
  }
  return value;
}

function toPlan(row: PlanRow): SubscriptionPlan {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    pricePerMonthCents: Number(row.price_per_month_cents),
    maxUsers: Number(row.max_users),
    maxStorageGb: Number(row.max_storage_gb),
    isActive: row.is_active,
    stripePriceId: row.stripe_price_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toSubscription(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    planId: row.plan_id,
    status: toStatus(row.status),
    startDate: row.start_date,
    endDate: row.end_date,
    cancelledAt: row.cancelled_at,
    stripeSubscriptionId: row.stripe_subscription_id,
    stripeCustomerId: row.stripe_customer_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getPlanById(
  db: DbExecutor,
  planId: string,
): Promise<SubscriptionPlan | undefined> {
  const row = await selectPlanByIdSql(db, planId);
  return row ? toPlan(row) : undefined;
}

export async function getPlanByName(
  db: DbExecutor,
  name: string,
): Promise<SubscriptionPlan | undefined> {
  const row = await selectPlanByNameSql(db, name);
  return row ? toPlan(row) : undefined;
}

export async function listActivePlans(db: DbExecutor): Promise<SubscriptionPlan[]> {
  const rows = await selectActivePlansSql(db);
  return rows.map(toPlan);
}

export async function getSubscriptionForTenant(
  db: DbExecutor,
  scope: TenantScope,
  tenantId: string,
): Promise<Subscription | undefined> {
  const row = await selectSubscriptionByTenantIdSql(db, scope, tenantId);
  return row ? toSubscription(row) : undefined;
}
