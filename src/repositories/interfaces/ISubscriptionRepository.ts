import { PoolClient } from 'pg';
import { Subscription } from '@/models';

export interface PlanUpdate {
  stripePriceId: string;
  planId: string;
  stripeStatus: string;
  currentPeriodStart: Date;
  currentPeriodEnd: Date;
}

/**
 * Subscription Repository Interface
 */
export interface ISubscriptionRepository {
  /**
   * Newest subscription in an active status (active, trialing, past_due)
   */
  findActiveByUserId(userId: string, client?: PoolClient): Promise<Subscription | null>;

  /**
   * Record a price swap together with the billing period the processor reports
   */
  updatePlan(subscriptionId: string, plan: PlanUpdate, client?: PoolClient): Promise<Subscription>;

  updatePeriod(
    subscriptionId: string,
    periodStart: Date,
    periodEnd: Date,
    client?: PoolClient
  ): Promise<Subscription>;
}
