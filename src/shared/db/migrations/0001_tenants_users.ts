/**
 * src/shared/db/migrations/0001_tenants_users.ts
 *
 * WHY:
 * - Tenants are the isolation boundary; every user row belongs to exactly one tenant.
 * - The same email may exist in many tenants, but only once per tenant.
 *
 * RULES:
 * - Ids are generated by the application (no DB extension needed).
 * - Allowed status/role values are CHECK constraints (pragmatic & easy to migrate).
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('tenants')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('name', 'text', (col) => col.notNull())
    // subdomain = routing key (e.g. acme → acme.example.com)
    .addColumn('subdomain', 'text', (col) => col.notNull().unique())
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('ACTIVE'))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addCheckConstraint(
      'tenants_status_check',
      sql`status IN ('ACTIVE','SUSPENDED','CANCELLED','DELETED')`,
    )
    .execute();

  await db.schema
    .createTable('users')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('tenant_id', 'uuid', (col) =>
      col.notNull().references('tenants.id').onDelete('cascade'),
    )
    .addColumn('email', 'text', (col) => col.notNull())
    .addColumn('password_hash', 'text', (col) => col.notNull())
    .addColumn('first_name', 'text', (col) => col.notNull())
    .addColumn('last_name', 'text', (col) => col.notNull())
    .addColumn('role', 'text', (col) => col.notNull().defaultTo('USER'))
    .addColumn('email_verified', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('last_login_at', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addUniqueConstraint('users_tenant_email_unique', ['tenant_id', 'email'])
    .addCheckConstraint('users_role_check', sql`role IN ('USER','ADMIN','SUPER_ADMIN')`)
    .execute();

  await db.schema.createIndex('users_tenant_id_idx').on('users').column('tenant_id').execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('users').execute();
  await db.schema.dropTable('tenants').execute();
}
