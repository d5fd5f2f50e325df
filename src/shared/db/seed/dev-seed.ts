/**
 * src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates:
 * - a default plan (if missing)
 * - a tenant with a trial subscription on that plan (if missing)
 * - an ADMIN user for that tenant (if missing)
 *
 * Idempotent: safe to run on every start.
 *
 * IMPORTANT:
 * - Stores only the bcrypt hash of the seed password.
 * - The caller (build-app) skips this in production.
 */

import { AuditWriter } from '../../audit/audit.writer';
import type { AuditRepo } from '../../audit/audit.repo';
import type { DbExecutor } from '../db';
import { tenantScope } from '../tenant-scope';
import type { Logger } from '../../logger/logger';
import type { PasswordHasher } from '../../security/password-hasher';
import {
  buildNewPlan,
  getPlanByName,
  type SubscriptionModule,
  type SubscriptionPlan,
} from '../../../modules/subscriptions';
import type { Tenant, TenantModule } from '../../../modules/tenants';
import { buildNewUser, getUserByEmail, normalizeEmail, type UserModule } from '../../../modules/users';

export const DEV_SEED_PLAN = {
  name: 'Starter',
  description: 'Default development plan',
  pricePerMonthCents: 0,
  maxUsers: 10,
  maxStorageGb: 5,
} as const;

export type DevSeedOptions = {
  tenantSubdomain: string;
  tenantName: string;
  adminEmail: string;
  adminPassword: string;
};

export type DevSeedDeps = {
  db: DbExecutor;
  logger: Logger;
  passwordHasher: PasswordHasher;
  auditRepo: AuditRepo;
  subscriptions: SubscriptionModule;
  tenants: TenantModule;
  users: UserModule;
};

const flow = 'seed.dev';

async function ensurePlan(deps: DevSeedDeps): Promise<SubscriptionPlan> {
  const existing = await getPlanByName(deps.db, DEV_SEED_PLAN.name);
  if (existing) return existing;

  const plan = buildNewPlan(DEV_SEED_PLAN);
  await deps.subscriptions.planRepo.insertPlan(plan);

  deps.logger.info('seed.plan.created', { flow, planId: plan.id, planName: plan.name });
  return plan;
}

async function ensureTenant(
  deps: DevSeedDeps,
  options: DevSeedOptions,
  plan: SubscriptionPlan,
): Promise<Tenant> {
  const existing = await deps.tenants.getTenantBySubdomain(options.tenantSubdomain);
  if (existing) {
    deps.logger.info('seed.tenant.exists', { flow, tenantId: existing.id });
    return existing;
  }

  const audit = new AuditWriter(deps.auditRepo, { requestId: flow });
  return deps.tenants.provisionTenant(audit, {
    name: options.tenantName,
    subdomain: options.tenantSubdomain,
    trialPlanId: plan.id,
  });
}

export async function runDevSeed(deps: DevSeedDeps, options: DevSeedOptions): Promise<void> {
  const plan = await ensurePlan(deps);
  const tenant = await ensureTenant(deps, options, plan);

  const scope = tenantScope(tenant.id);
  const email = normalizeEmail(options.adminEmail);

  const existingAdmin = await getUserByEmail(deps.db, scope, email);
  if (existingAdmin) {
    deps.logger.info('seed.admin.exists', { flow, tenantId: tenant.id, userId: existingAdmin.id });
    return;
  }

  const admin = buildNewUser({
    tenantId: tenant.id,
    email,
    passwordHash: await deps.passwordHasher.hash(options.adminPassword),
    firstName: 'Admin',
    lastName: 'User',
    role: 'ADMIN',
  });
  await deps.users.userRepo.insertUser(scope, admin);

  deps.logger.info('seed.admin.created', { flow, tenantId: tenant.id, userId: admin.id });
}
