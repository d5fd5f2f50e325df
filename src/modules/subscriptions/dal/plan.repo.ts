/**
 * src/modules/subscriptions/dal/plan.repo.ts
 *
 * DAL WRITES ONLY for the plan catalog.
 * - No transactions started here. No AppError. No policies.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { SubscriptionPlan } from '../subscription.types';

export class PlanRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): PlanRepo {
    return new PlanRepo(db);
  }

  async insertPlan(plan: SubscriptionPlan): Promise<void> {
    await this.db
      .insertInto('subscription_plans')
      .values({
        id: plan.id,
        name: plan.name,
        description: plan.description,
        price_per_month_cents: plan.pricePerMonthCents,
        max_users: plan.maxUsers,
        max_storage_gb: plan.maxStorageGb,
        is_active: plan.isActive,
        stripe_price_id: plan.stripePriceId,
        created_at: plan.createdAt,
        updated_at: plan.updatedAt,
      })
      .execute();
  }

  /** Persists the mutable fields (pricing + availability). */
  async savePlan(plan: SubscriptionPlan): Promise<void> {
    await this.db
      .updateTable('subscription_plans')
      .set({
        price_per_month_cents: plan.pricePerMonthCents,
        stripe_price_id: plan.stripePriceId,
        is_active: plan.isActive,
        updated_at: plan.updatedAt,
      })
      .where('id', '=', plan.id)
      .execute();
  }
}
