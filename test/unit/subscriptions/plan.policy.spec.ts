import { describe, it, expect } from 'vitest';
import {
  activatePlan,
  buildNewPlan,
  deactivatePlan,
  updatePlanPricing,
} from '../../../src/modules/subscriptions';
import { DomainRuleError } from '../../../src/shared/http/errors';

const T0 = new Date('2026-01-01T00:00:00.000Z');
const T1 = new Date('2026-02-01T00:00:00.000Z');

const input = {
  name: ' Pro ',
  description: 'For teams',
  pricePerMonthCents: 4900,
  maxUsers: 25,
  maxStorageGb: 100,
  stripePriceId: 'price_pro',
};

describe('buildNewPlan', () => {
  it('builds an active plan', () => {
    const plan = buildNewPlan(input, T0);

    expect(plan).toMatchObject({
      name: 'Pro',
      description: 'For teams',
      pricePerMonthCents: 4900,
      maxUsers: 25,
      maxStorageGb: 100,
      isActive: true,
      stripePriceId: 'price_pro',
      createdAt: T0,
      updatedAt: T0,
    });
  });

  it('defaults description and Stripe price id', () => {
    const plan = buildNewPlan(
      { name: 'Free', pricePerMonthCents: 0, maxUsers: 1, maxStorageGb: 1 },
      T0,
    );
    expect(plan.description).toBe('');
    expect(plan.stripePriceId).toBeNull();
  });

  it.each([
    [{ name: '   ' }, 'Plan name cannot be empty'],
    [{ pricePerMonthCents: -1 }, 'Price per month cannot be negative'],
    [{ maxUsers: 0 }, 'Max users must be greater than zero'],
    [{ maxStorageGb: 0 }, 'Max storage must be greater than zero'],
  ])('rejects %j', (override, message) => {
    expect(() => buildNewPlan({ ...input, ...override }, T0)).toThrowError(
      new DomainRuleError(message),
    );
  });
});

describe('plan updates', () => {
  it('updates pricing and keeps the previous Stripe price id when none is given', () => {
    const plan = buildNewPlan(input, T0);

    expect(updatePlanPricing(plan, { pricePerMonthCents: 5900 }, T1)).toMatchObject({
      pricePerMonthCents: 5900,
      stripePriceId: 'price_pro',
      updatedAt: T1,
    });
    expect(
      updatePlanPricing(plan, { pricePerMonthCents: 5900, stripePriceId: '' }, T1).stripePriceId,
    ).toBe('price_pro');
    expect(
      updatePlanPricing(plan, { pricePerMonthCents: 5900, stripePriceId: 'price_v2' }, T1)
        .stripePriceId,
    ).toBe('price_v2');
  });

  it('rejects a negative price', () => {
    const plan = buildNewPlan(input, T0);
    expect(() => updatePlanPricing(plan, { pricePerMonthCents: -5 }, T1)).toThrowError(
      DomainRuleError,
    );
  });

  it('toggles activity', () => {
    const plan = buildNewPlan(input, T0);
    const inactive = deactivatePlan(plan, T1);

    expect(inactive.isActive).toBe(false);
    expect(inactive.updatedAt).toEqual(T1);
    expect(activatePlan(inactive, T1).isActive).toBe(true);
  });
});
