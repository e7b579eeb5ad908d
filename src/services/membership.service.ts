import { Subscription } from '@/models';
import {
  SWITCHABLE_PLAN_IDS,
  findPlanById,
  findPlanByPriceId,
} from '@/config/membershipPlans';
import { NotFoundError, BusinessRuleError, ValidationError, OperationFailedError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IPaymentProcessor, ProcessorSubscription } from '@/interfaces/IPaymentProcessor';
import { parseIsoDate } from '@/utils/dates';
import { IUserRepository, ISubscriptionRepository } from '@/repositories/interfaces';
import { NotificationService } from './notification.service';

const logger = createLogger('MembershipService');

export type PlanChangeDirection = 'upgrade' | 'downgrade';

export type MembershipTypeChangeResult =
  | { changed: false; message: string }
  | {
      changed: true;
      direction: PlanChangeDirection;
      subscription: Subscription;
      message: string;
    };

function isSwitchablePlanId(value: string): boolean {
  return SWITCHABLE_PLAN_IDS.some((planId) => planId === value);
}

/**
 * Membership Service
 * Plan switches (through the payment processor) and manual period edits
 */
export class MembershipService {
  constructor(
    private userRepo: IUserRepository,
    private subscriptionRepo: ISubscriptionRepository,
    private paymentProcessor: IPaymentProcessor,
    private notifications: NotificationService
  ) {}

  /**
   * Switch a member between the single and family plans
   *
   * Business Rules:
   * - Lifetime membership is awarded, never switched to
   * - Upgrades are prorated and invoiced immediately
   * - Downgrades take effect without proration
   */
  async changeMembershipType(
    userId: string,
    membershipType: string
  ): Promise<MembershipTypeChangeResult> {
    const requested = membershipType.trim();
    if (requested === '') {
      throw new ValidationError('Please select a membership type');
    }

    const newPlan = isSwitchablePlanId(requested) ? findPlanById(requested) : undefined;
    if (!newPlan || !newPlan.stripePriceId) {
      throw new ValidationError('Invalid membership type selected');
    }

    const user = await this.userRepo.findUserById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    const subscription = await this.subscriptionRepo.findActiveByUserId(userId);
    if (!subscription) {
      throw new BusinessRuleError('User does not have an active subscription to change');
    }

    const currentPlan = findPlanByPriceId(subscription.stripePriceId);
    if (!currentPlan) {
      throw new BusinessRuleError('Could not determine current membership plan');
    }

    if (currentPlan.id === newPlan.id) {
      return { changed: false, message: 'User is already on that membership plan' };
    }

    const direction: PlanChangeDirection =
      newPlan.amount > currentPlan.amount ? 'upgrade' : 'downgrade';

    let processed: ProcessorSubscription;
    try {
      processed = await this.paymentProcessor.changeSubscriptionPrice({
        subscriptionId: subscription.stripeId,
        newPriceId: newPlan.stripePriceId,
        prorationBehavior: direction === 'upgrade' ? 'always_invoice' : 'none',
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(
        { error, userId, subscriptionId: subscription.id, newPlan: newPlan.id },
        'Payment processor rejected membership change'
      );
      throw new OperationFailedError(`Failed to change membership type: ${reason}`, error, 502);
    }

    const saved = await this.subscriptionRepo.updatePlan(subscription.id, {
      stripePriceId: newPlan.stripePriceId,
      planId: newPlan.id,
      stripeStatus: processed.status,
      currentPeriodStart: processed.currentPeriodStart,
      currentPeriodEnd: processed.currentPeriodEnd,
    });

    logger.info(
      { userId, from: currentPlan.id, to: newPlan.id, direction },
      'Membership type changed'
    );
    await this.notifications.membershipPlanChanged(user, currentPlan.name, newPlan.name);

    return {
      changed: true,
      direction,
      subscription: saved,
      message: `Membership type changed from ${currentPlan.name} to ${newPlan.name}`,
    };
  }

  async updateMembershipPeriod(
    userId: string,
    period: { periodStart: string; periodEnd: string }
  ): Promise<{ subscription: Subscription; message: string }> {
    const periodStart = parseIsoDate(period.periodStart);
    const periodEnd = parseIsoDate(period.periodEnd);

    if (!periodStart || !periodEnd) {
      throw new ValidationError('Invalid date format');
    }
    if (periodEnd.getTime() <= periodStart.getTime()) {
      throw new ValidationError('Membership period end must be after its start');
    }

    const user = await this.userRepo.findUserById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    const subscription = await this.subscriptionRepo.findActiveByUserId(userId);
    if (!subscription) {
      throw new BusinessRuleError('No active subscription found');
    }

    const updated = await this.subscriptionRepo.updatePeriod(
      subscription.id,
      periodStart,
      periodEnd
    );

    logger.info(
      { userId, subscriptionId: subscription.id, periodStart, periodEnd },
      'Membership period updated'
    );

    return { subscription: updated, message: 'Membership period updated successfully' };
  }
}
