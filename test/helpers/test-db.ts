import { Kysely, PostgresDialect } from 'kysely';
import { newDb } from 'pg-mem';

import type { Db } from '../../src/shared/db/db';
import type { DB } from '../../src/shared/db/database.schema';
import { applyAllMigrations } from '../../src/shared/db/migrations';

/**
 * WHY:
 * - DAL and E2E tests need real SQL semantics (constraints, joins, transactions)
 *   without a Postgres server.
 *
 * RULES:
 * - One in-process database per call: tests never share rows.
 * - Schema comes from the real migrations.
 */
export async function createTestDb(): Promise<Db> {
  const mem = newDb();
  const { Pool } = mem.adapters.createPg();

  const db = new Kysely<DB>({
    dialect: new PostgresDialect({ pool: new Pool() }),
  });

  await applyAllMigrations(db);
  return db;
}
