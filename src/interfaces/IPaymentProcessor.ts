/**
 * Payment processor abstraction used for membership plan changes
 */

export type ProrationBehavior = 'always_invoice' | 'none';

export interface SubscriptionPriceChange {
  subscriptionId: string;
  newPriceId: string;
  prorationBehavior: ProrationBehavior;
}

export interface ProcessorSubscription {
  id: string;
  status: string;
  priceId: string | null;
  currentPeriodStart: Date;
  currentPeriodEnd: Date;
}

export interface IPaymentProcessor {
  changeSubscriptionPrice(change: SubscriptionPriceChange): Promise<ProcessorSubscription>;
}
