/**
 * src/modules/subscriptions/dal/plan.query-sql.ts
 *
 * DAL READS ONLY. subscription_plans is a global catalog: no TenantScope.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { SubscriptionPlansTable } from '../../../shared/db/database.schema';

export type PlanRow = Selectable<SubscriptionPlansTable>;

export async function selectPlanByIdSql(
  db: DbExecutor,
  planId: string,
): Promise<PlanRow | undefined> {
  return db.selectFrom('subscription_plans').selectAll().where('id', '=', planId).executeTakeFirst();
}

export async function selectPlanByNameSql(
  db: DbExecutor,
  name: string,
): Promise<PlanRow | undefined> {
  return db.selectFrom('subscription_plans').selectAll().where('name', '=', name).executeTakeFirst();
}

export async function selectActivePlansSql(db: DbExecutor): Promise<PlanRow[]> {
  return db
    .selectFrom('subscription_plans')
    .selectAll()
    .where('is_active', '=', true)
    .orderBy('price_per_month_cents', 'asc')
    .execute();
}
