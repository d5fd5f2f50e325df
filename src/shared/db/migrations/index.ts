/**
 * src/shared/db/migrations/index.ts
 *
 * Static migration registry. Order = key order; names are what Kysely records.
 * A static list works the same under tsx, Vitest and compiled output.
 */

import type { Kysely, Migration } from 'kysely';
import type { DB } from '../database.schema';

import * as m0001 from './0001_tenants_users';
import * as m0002 from './0002_refresh_tokens';
import * as m0003 from './0003_subscriptions';
import * as m0004 from './0004_audit_events';

export const MIGRATIONS: Readonly<Record<string, Migration>> = {
  '0001_tenants_users': m0001,
  '0002_refresh_tokens': m0002,
  '0003_subscriptions': m0003,
  '0004_audit_events': m0004,
};

/**
 * Applies every migration in order without Kysely's migration bookkeeping.
 * Used for throwaway databases (tests); real databases go through migrate.ts.
 */
export async function applyAllMigrations(db: Kysely<DB>): Promise<void> {
  for (const migration of Object.values(MIGRATIONS)) {
    await migration.up(db);
  }
}
