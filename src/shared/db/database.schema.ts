/**
 * src/shared/db/database.schema.ts
 *
 * Kysely table interfaces. Mirrors the migrations in ./migrations; change both together.
 * Ids and timestamps are written by the application; only refresh_tokens.seq is Generated.
 */

import type { ColumnType, Generated } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

/** jsonb: parsed value on select, JSON text on insert/update. */
export type JsonColumn = ColumnType<unknown, string, string>;

export interface TenantsTable {
  id: string;
  name: string;
  subdomain: string;
  status: string;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface UsersTable {
  id: string;
  tenant_id: string;
  email: string;
  password_hash: string;
  first_name: string;
  last_name: string;
  role: string;
  email_verified: boolean;
  last_login_at: Timestamp | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface RefreshTokensTable {
  id: string;
  user_id: string;
  token_hash: string;
  expires_at: Timestamp;
  is_revoked: boolean;
  revoked_at: Timestamp | null;
  created_at: Timestamp;
  seq: Generated<number>;
}

export interface SubscriptionPlansTable {
  id: string;
  name: string;
  description: string;
  price_per_month_cents: number;
  max_users: number;
  max_storage_gb: number;
  is_active: boolean;
  stripe_price_id: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface SubscriptionsTable {
  id: string;
  tenant_id: string;
  plan_id: string;
  status: string;
  start_date: Timestamp;
  end_date: Timestamp | null;
  cancelled_at: Timestamp | null;
  stripe_subscription_id: string | null;
  stripe_customer_id: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface AuditEventsTable {
  id: string;
  tenant_id: string | null;
  user_id: string | null;
  action: string;
  request_id: string | null;
  ip: string | null;
  user_agent: string | null;
  metadata: JsonColumn;
  created_at: Timestamp;
}

export interface DB {
  tenants: TenantsTable;
  users: UsersTable;
  refresh_tokens: RefreshTokensTable;
  subscription_plans: SubscriptionPlansTable;
  subscriptions: SubscriptionsTable;
  audit_events: AuditEventsTable;
}
