import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestDb } from '../helpers/test-db';
import { insertTestTenant } from '../helpers/fixtures';
import type { Db } from '../../src/shared/db/db';
import { tenantScope } from '../../src/shared/db/tenant-scope';
import {
  buildNewPlan,
  createSubscriptionModule,
  deactivatePlan,
  getPlanById,
  getPlanByName,
  listActivePlans,
  updatePlanPricing,
} from '../../src/modules/subscriptions';

const T0 = new Date('2026-03-01T00:00:00.000Z');
const T1 = new Date('2026-03-10T00:00:00.000Z');

describe('subscriptions DAL', () => {
  let db: Db;

  beforeEach(async () => {
    db = await createTestDb();
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('stores plans and persists pricing and availability changes', async () => {
    const subscriptions = createSubscriptionModule({ db });
    const plan = buildNewPlan(
      { name: 'Team', pricePerMonthCents: 1900, maxUsers: 10, maxStorageGb: 20 },
      T0,
    );
    await subscriptions.planRepo.insertPlan(plan);

    expect(await getPlanByName(db, 'Team')).toEqual(plan);

    await subscriptions.planRepo.savePlan(
      deactivatePlan(updatePlanPricing(plan, { pricePerMonthCents: 2900 }, T1), T1),
    );

    expect(await getPlanById(db, plan.id)).toMatchObject({
      pricePerMonthCents: 2900,
      isActive: false,
      updatedAt: T1,
    });
    expect(await listActivePlans(db)).toEqual([]);
  });

  it('runs a trial through activate and cancel, scoped to its tenant', async () => {
    const subscriptions = createSubscriptionModule({ db });
    const tenant = await insertTestTenant(db);
    const other = await insertTestTenant(db);
    const plan = buildNewPlan(
      { name: 'Starter', pricePerMonthCents: 0, maxUsers: 5, maxStorageGb: 1 },
      T0,
    );
    await subscriptions.planRepo.insertPlan(plan);

    const scope = tenantScope(tenant.id);
    const trial = await subscriptions.startTrial(db, scope, {
      tenantId: tenant.id,
      planId: plan.id,
      now: T0,
    });
    expect(await subscriptions.getForTenant(db, scope, tenant.id)).toEqual(trial);

    expect(
      await subscriptions.getForTenant(db, tenantScope(other.id), tenant.id),
    ).toBeUndefined();
    expect(await subscriptions.activate(db, tenantScope(other.id), tenant.id, T1)).toBeUndefined();

    const active = await subscriptions.activate(db, scope, tenant.id, T1);
    expect(active?.status).toBe('ACTIVE');

    await subscriptions.cancel(db, scope, tenant.id, T1);
    expect(await subscriptions.getForTenant(db, scope, tenant.id)).toMatchObject({
      status: 'CANCELLED',
      cancelledAt: T1,
      endDate: T1,
    });
  });

  it('allows one subscription per tenant', async () => {
    const subscriptions = createSubscriptionModule({ db });
    const tenant = await insertTestTenant(db);
    const plan = buildNewPlan(
      { name: 'Solo', pricePerMonthCents: 0, maxUsers: 1, maxStorageGb: 1 },
      T0,
    );
    await subscriptions.planRepo.insertPlan(plan);

    const scope = tenantScope(tenant.id);
    await subscriptions.startTrial(db, scope, { tenantId: tenant.id, planId: plan.id, now: T0 });
    await expect(
      subscriptions.startTrial(db, scope, { tenantId: tenant.id, planId: plan.id, now: T0 }),
    ).rejects.toThrow();
  });
});
