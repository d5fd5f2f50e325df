/**
 * src/shared/db/migrations/0003_subscriptions.ts
 *
 * WHY:
 * - Plans are global catalog rows; a tenant has at most one subscription.
 * - Prices are integer cents (no float money).
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('subscription_plans')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('description', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('price_per_month_cents', 'integer', (col) => col.notNull())
    .addColumn('max_users', 'integer', (col) => col.notNull())
    .addColumn('max_storage_gb', 'integer', (col) => col.notNull())
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('stripe_price_id', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createTable('subscriptions')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('tenant_id', 'uuid', (col) =>
      col.notNull().unique().references('tenants.id').onDelete('cascade'),
    )
    .addColumn('plan_id', 'uuid', (col) => col.notNull().references('subscription_plans.id'))
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('start_date', 'timestamptz', (col) => col.notNull())
    .addColumn('end_date', 'timestamptz')
    .addColumn('cancelled_at', 'timestamptz')
    .addColumn('stripe_subscription_id', 'text')
    .addColumn('stripe_customer_id', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addCheckConstraint(
      'subscriptions_status_check',
      sql`status IN ('TRIALING','ACTIVE','PAST_DUE','CANCELLED','EXPIRED')`,
    )
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('subscriptions').execute();
  await db.schema.dropTable('subscription_plans').execute();
}
