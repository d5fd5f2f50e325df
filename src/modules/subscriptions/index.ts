/**
 * src/modules/subscriptions/index.ts
 *
 * Public surface of the subscriptions module. No deep imports from other modules.
 */

export { createSubscriptionModule, type SubscriptionModule } from './subscription.module';
export { buildNewPlan, updatePlanPricing, activatePlan, deactivatePlan } from './policies/plan.policy';
export { isSubscriptionActive } from './policies/subscription.policy';
export { getPlanByName, getPlanById, listActivePlans } from './queries/subscription.queries';
export type { Subscription, SubscriptionPlan, SubscriptionStatus } from './subscription.types';
