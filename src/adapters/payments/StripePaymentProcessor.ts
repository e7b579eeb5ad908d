/**
 * Stripe Payment Processor Adapter
 *
 * Only the operations the admin console performs against Stripe:
 * swapping the price of a member's subscription.
 */

import Stripe from 'stripe';
import {
  IPaymentProcessor,
  ProcessorSubscription,
  SubscriptionPriceChange,
} from '@/interfaces/IPaymentProcessor';

export class StripePaymentProcessor implements IPaymentProcessor {
  private stripe: Stripe | null = null;

  constructor(private readonly secretKey: string) {}

  /**
   * Lazily constructed so the API boots without Stripe configured
   */
  private getStripe(): Stripe {
    if (!this.stripe) {
      if (!this.secretKey) {
        throw new Error('STRIPE_SECRET_KEY is not configured');
      }
      this.stripe = new Stripe(this.secretKey);
    }
    return this.stripe;
  }

  async changeSubscriptionPrice(change: SubscriptionPriceChange): Promise<ProcessorSubscription> {
    const stripe = this.getStripe();

    const subscription = await stripe.subscriptions.retrieve(change.subscriptionId);
    const item = subscription.items.data[0];
    if (!item) {
      throw new Error(`Subscription ${change.subscriptionId} has no items`);
    }

    const updated = await stripe.subscriptions.update(change.subscriptionId, {
      items: [{ id: item.id, price: change.newPriceId }],
      proration_behavior: change.prorationBehavior,
    });

    return {
      id: updated.id,
      status: updated.status,
      priceId: updated.items.data[0]?.price.id ?? null,
      currentPeriodStart: new Date(updated.current_period_start * 1000),
      currentPeriodEnd: new Date(updated.current_period_end * 1000),
    };
  }
}
