/**
 * src/modules/subscriptions/dal/subscription.repo.ts
 *
 * DAL WRITES ONLY for subscriptions.
 *
 * RULES:
 * - Tenant-owned: writes outside the scope's tenant are programming errors (throw).
 * - No transactions started here. No AppError. No policies.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { isVisibleInScope, scopeFilter, type TenantScope } from '../../../shared/db/tenant-scope';
import type { Subscription } from '../subscription.types';

export class SubscriptionRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): SubscriptionRepo {
    return new SubscriptionRepo(db);
  }

  async insertSubscription(scope: TenantScope, sub: Subscription): Promise<void> {
    if (!isVisibleInScope(scope, sub.tenantId)) {
      throw new Error('subscriptions: insert outside tenant scope');
    }

    await this.db
      .insertInto('subscriptions')
      .values({
        id: sub.id,
        tenant_id: sub.tenantId,
        plan_id: sub.planId,
        status: sub.status,
        start_date: sub.startDate,
        end_date: sub.endDate,
        cancelled_at: sub.cancelledAt,
        stripe_subscription_id: sub.stripeSubscriptionId,
        stripe_customer_id: sub.stripeCustomerId,
        created_at: sub.createdAt,
        updated_at: sub.updatedAt,
      })
      .execute();
  }

  /** Persists status fields. Returns false when no row in scope matched. */
  async saveSubscription(scope: TenantScope, sub: Subscription): Promise<boolean> {
    let query = this.db
      .updateTable('subscriptions')
      .set({
        status: sub.status,
        end_date: sub.endDate,
        cancelled_at: sub.cancelledAt,
        updated_at: sub.updatedAt,
      })
      .where('id', '=', sub.id);

    const scopedTenantId = scopeFilter(scope, 'subscriptions');
    if (scopedTenantId !== null) {
      query = query.where('tenant_id', '=', scopedTenantId);
    }

    const rows = await query.returning(['id']).execute();
    return rows.length > 0;
  }
}
