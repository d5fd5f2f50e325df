/**
 * src/modules/subscriptions/dal/subscription.query-sql.ts
 *
 * DAL READS ONLY
 * - subscriptions is tenant-owned: every read takes a TenantScope.
 * - No AppError. No policies.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { SubscriptionsTable } from '../../../shared/db/database.schema';
import { scopeFilter, type TenantScope } from '../../../shared/db/tenant-scope';

export type SubscriptionRow = Selectable<SubscriptionsTable>;

export async function selectSubscriptionByTenantIdSql(
  db: DbExecutor,
  scope: TenantScope,
  tenantId: string,
): Promise<SubscriptionRow | undefined> {
  let query = db.selectFrom('subscriptions').selectAll().where('tenant_id', '=', tenantId);

  const scopedTenantId = scopeFilter(scope, 'subscriptions');
  if (scopedTenantId !== null) {
    query = query.where('tenant_id', '=', scopedTenantId);
  }

  return query.executeTakeFirst();
}
