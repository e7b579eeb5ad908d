import { PoolClient } from 'pg';
import { queryWith } from '@/config/database';
import { Subscription } from '@/models';
import { ACTIVE_SUBSCRIPTION_STATUSES } from '@/constants/users';
import { NotFoundError } from '@/errors';
import { ISubscriptionRepository, PlanUpdate } from './interfaces/ISubscriptionRepository';

const SUBSCRIPTION_COLUMNS = `
  id,
  user_id AS "userId",
  stripe_id AS "stripeId",
  stripe_status AS "stripeStatus",
  stripe_price_id AS "stripePriceId",
  plan_id AS "planId",
  current_period_start AS "currentPeriodStart",
  current_period_end AS "currentPeriodEnd",
  ends_at AS "endsAt"
`;

/**
 * Subscription Repository
 */
export class SubscriptionRepository implements ISubscriptionRepository {
  async findActiveByUserId(userId: string, client?: PoolClient): Promise<Subscription | null> {
    const result = await queryWith<Subscription>(
      client,
      `
      SELECT ${SUBSCRIPTION_COLUMNS}
      FROM subscriptions
      WHERE user_id = $1 AND stripe_status = ANY($2::text[])
      ORDER BY inserted_at DESC
      LIMIT 1
      `,
      [userId, [...ACTIVE_SUBSCRIPTION_STATUSES]]
    );

    return result.rows[0] ?? null;
  }

  async updatePlan(
    subscriptionId: string,
    plan: PlanUpdate,
    client?: PoolClient
  ): Promise<Subscription> {
    const result = await queryWith<Subscription>(
      client,
      `
      UPDATE subscriptions
      SET stripe_price_id = $2,
          plan_id = $3,
          stripe_status = $4,
          current_period_start = $5,
          current_period_end = $6,
          updated_at = NOW()
      WHERE id = $1
      RETURNING ${SUBSCRIPTION_COLUMNS}
      `,
      [
        subscriptionId,
        plan.stripePriceId,
        plan.planId,
        plan.stripeStatus,
        plan.currentPeriodStart,
        plan.currentPeriodEnd,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('Subscription not found');
    }
    return row;
  }

  async updatePeriod(
    subscriptionId: string,
    periodStart: Date,
    periodEnd: Date,
    client?: PoolClient
  ): Promise<Subscription> {
    const result = await queryWith<Subscription>(
      client,
      `
      UPDATE subscriptions
      SET current_period_start = $2, current_period_end = $3, updated_at = NOW()
      WHERE id = $1
      RETURNING ${SUBSCRIPTION_COLUMNS}
      `,
      [subscriptionId, periodStart, periodEnd]
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('Subscription not found');
    }
    return row;
  }
}
