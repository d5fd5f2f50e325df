/**
 * src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev/CI against a real Postgres.
 * - Migrations come from the static registry, so the same code runs under tsx and from dist/.
 *
 * HOW TO USE:
 * - npm run db:migrate
 */

import 'dotenv/config';

import { Migrator, type MigrationProvider } from 'kysely';

import { createDb } from './db';
import { MIGRATIONS } from './migrations';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

const staticProvider: MigrationProvider = {
  getMigrations: () => Promise.resolve({ ...MIGRATIONS }),
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  logger.info('db.migrate.start', {
    flow: 'db.migrate',
    count: Object.keys(MIGRATIONS).length,
  });

  const migrator = new Migrator({ db, provider: staticProvider });
  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') {
      logger.info('db.migrate.success', { flow: 'db.migrate', migration: r.migrationName });
    }
    if (r.status === 'Error') {
      logger.error('db.migrate.error', { flow: 'db.migrate', migration: r.migrationName });
    }
  });

  await db.destroy();

  if (error) {
    logger.error('db.migrate.failed', {
      flow: 'db.migrate',
      message: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }

  logger.info('db.migrate.up_to_date', { flow: 'db.migrate' });
}

runMigrations().catch((err: unknown) => {
  logger.error('db.migrate.fatal', {
    flow: 'db.migrate',
    message: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
