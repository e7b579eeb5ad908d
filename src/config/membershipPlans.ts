import { env } from '@/config/env';

/**
 * Membership plans sold through Stripe
 *
 * Amounts are whole USD per year. Lifetime membership is awarded by the
 * board, never purchased or switched to, so it carries no price.
 */
export interface MembershipPlan {
  id: 'single' | 'family' | 'lifetime';
  name: string;
  amount: number;
  interval: 'year' | null;
  stripePriceId: string | null;
}

export const MEMBERSHIP_PLANS: readonly MembershipPlan[] = [
  {
    id: 'single',
    name: 'Single',
    amount: 45,
    interval: 'year',
    stripePriceId: env.STRIPE_SINGLE_PRICE_ID,
  },
  {
    id: 'family',
    name: 'Family',
    amount: 65,
    interval: 'year',
    stripePriceId: env.STRIPE_FAMILY_PRICE_ID,
  },
  {
    id: 'lifetime',
    name: 'Lifetime',
    amount: 0,
    interval: null,
    stripePriceId: null,
  },
];

/**
 * Plans an existing subscription can be switched between
 */
export const SWITCHABLE_PLAN_IDS = ['single', 'family'] as const;
export type SwitchablePlanId = (typeof SWITCHABLE_PLAN_IDS)[number];

export function findPlanById(planId: string): MembershipPlan | undefined {
  return MEMBERSHIP_PLANS.find((plan) => plan.id === planId);
}

export function findPlanByPriceId(priceId: string | null): MembershipPlan | undefined {
  if (!priceId) return undefined;
  return MEMBERSHIP_PLANS.find((plan) => plan.stripePriceId === priceId);
}
