/**
 * src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 * - Clean place to run the dev-only seed.
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps, type InfraOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, infra: InfraOverrides = {}) {
  const deps = await buildDeps(config, infra);
  const app = await buildServer({ config, deps });

  registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap
  if (config.seed.enabled) {
    const flow = 'seed.dev';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else {
      logger.info('seed.start', {
        flow,
        tenantSubdomain: config.seed.tenantSubdomain,
      });

      await runDevSeed(deps, {
        tenantSubdomain: config.seed.tenantSubdomain,
        tenantName: config.seed.tenantName,
        adminEmail: config.seed.adminEmail,
        adminPassword: config.seed.adminPassword,
      });

      logger.info('seed.done', {
        flow,
        tenantSubdomain: config.seed.tenantSubdomain,
      });
    }
  }

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
