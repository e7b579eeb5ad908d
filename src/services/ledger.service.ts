import Decimal from 'decimal.js';
import { ulid } from 'ulid';
import { z } from 'zod';
import { transaction } from '@/config/database';
import { PAGINATION_LIMITS } from '@/config/businessRules';
import ledgerAccountsData from '@/data/ledgerAccounts.json';
import {
  AccountBalance,
  Payment,
  PaymentWithUser,
  LedgerTransaction,
  LedgerEntryWithAccount,
  NewLedgerEntry,
} from '@/models';
import {
  ACCOUNT_NAMES,
  ACCOUNT_TYPES,
  BOOKING_PROPERTIES,
  ENTITY_TYPES,
  PAYMENT_PROVIDERS,
  PAYMENT_STATUSES,
  TRANSACTION_TYPES,
  BookingProperty,
  EntityType,
  PaymentStatus,
} from '@/constants/ledger';
import {
  AppError,
  BusinessRuleError,
  NotFoundError,
  OperationFailedError,
  ValidationError,
} from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import { ILedgerRepository, IUserRepository, DateRange } from '@/repositories/interfaces';
import { toMoneyString, negateMoney } from '@/utils/money';
import { parseIsoDate, startOfNextDay, daysAgo } from '@/utils/dates';
import { isUniqueViolation } from '@/utils/pgErrors';

const logger = createLogger('LedgerService');

const ledgerAccountSeedSchema = z.array(
  z.object({
    name: z.string().min(1),
    accountType: z.nativeEnum(ACCOUNT_TYPES),
    description: z.string(),
  })
);

export const BASIC_ACCOUNTS = ledgerAccountSeedSchema.parse(ledgerAccountsData);

export interface DateRangeQuery {
  startDate?: string;
  endDate?: string;
}

export interface RecordPaymentInput {
  userId: string;
  amount: string;
  entityType: string;
  entityId?: string | null;
  externalPaymentId: string;
  stripeFee?: string | null;
  description: string;
  property?: BookingProperty | null;
}

export interface RecordPayoutInput {
  amount: string;
  stripePayoutId: string;
  description: string;
}

export interface RefundInput {
  paymentId: string;
  amount: string;
  reason: string;
}

export interface CreditInput {
  userId: string;
  amount: string;
  reason: string;
  entityType: EntityType;
  entityId?: string | null;
}

function isEntityType(value: string): value is EntityType {
  return Object.values(ENTITY_TYPES).some((entityType) => entityType === value);
}

/**
 * Revenue account credited for a payment
 * Unknown entity types are booked as membership revenue.
 */
export function revenueAccountFor(entityType: string, property: BookingProperty | null): string {
  switch (entityType) {
    case ENTITY_TYPES.MEMBERSHIP:
      return ACCOUNT_NAMES.MEMBERSHIP_REVENUE;
    case ENTITY_TYPES.EVENT:
      return ACCOUNT_NAMES.EVENT_REVENUE;
    case ENTITY_TYPES.BOOKING:
      if (property === BOOKING_PROPERTIES.TAHOE) return ACCOUNT_NAMES.TAHOE_BOOKING_REVENUE;
      if (property === BOOKING_PROPERTIES.CLEAR_LAKE) {
        return ACCOUNT_NAMES.CLEAR_LAKE_BOOKING_REVENUE;
      }
      return ACCOUNT_NAMES.BOOKING_REVENUE;
    case ENTITY_TYPES.DONATION:
      return ACCOUNT_NAMES.DONATION_REVENUE;
    default:
      return ACCOUNT_NAMES.MEMBERSHIP_REVENUE;
  }
}

/**
 * Entries of a captured payment
 *
 * Amounts are signed in the natural direction of each account:
 * stripe_account +amount, revenue +amount, and for a fee
 * stripe_fees +fee with stripe_account -fee.
 */
export function buildPaymentEntries(input: {
  amount: string;
  fee: string | null;
  revenueAccount: string;
  entityLabel: string;
  description: string;
  relatedEntityType: EntityType | null;
  relatedEntityId: string | null;
}): NewLedgerEntry[] {
  const related = {
    relatedEntityType: input.relatedEntityType,
    relatedEntityId: input.relatedEntityId,
  };

  const entries: NewLedgerEntry[] = [
    {
      accountName: ACCOUNT_NAMES.STRIPE_ACCOUNT,
      amount: toMoneyString(input.amount),
      description: `Payment receivable from Stripe: ${input.description}`,
      ...related,
    },
    {
      accountName: input.revenueAccount,
      amount: toMoneyString(input.amount),
      description: `Revenue from ${input.entityLabel}: ${input.description}`,
      ...related,
    },
  ];

  if (input.fee && new Decimal(input.fee).gt(0)) {
    entries.push(
      {
        accountName: ACCOUNT_NAMES.STRIPE_FEES,
        amount: toMoneyString(input.fee),
        description: `Stripe processing fee: ${input.description}`,
        ...related,
      },
      {
        accountName: ACCOUNT_NAMES.STRIPE_ACCOUNT,
        amount: negateMoney(input.fee),
        description: `Stripe fee deduction: ${input.description}`,
        ...related,
      }
    );
  }

  return entries;
}

/**
 * Entries of a refund; the revenue reversal is only written when the
 * payment credited a revenue account
 */
export function buildRefundEntries(input: {
  amount: string;
  reason: string;
  paymentId: string;
  revenueAccount: string | null;
}): NewLedgerEntry[] {
  const related = {
    relatedEntityType: ENTITY_TYPES.ADMINISTRATION,
    relatedEntityId: input.paymentId,
  };

  const entries: NewLedgerEntry[] = [
    {
      accountName: ACCOUNT_NAMES.REFUND_EXPENSE,
      amount: toMoneyString(input.amount),
      description: `Refund issued: ${input.reason}`,
      ...related,
    },
    {
      accountName: ACCOUNT_NAMES.STRIPE_ACCOUNT,
      amount: negateMoney(input.amount),
      description: `Refund processed through Stripe: ${input.reason}`,
      ...related,
    },
  ];

  if (input.revenueAccount) {
    entries.push({
      accountName: input.revenueAccount,
      amount: negateMoney(input.amount),
      description: `Revenue reversal for refund: ${input.reason}`,
      ...related,
    });
  }

  return entries;
}

/**
 * Ledger Service
 * Payments, refunds, credits and payouts on the double-entry ledger
 */
export class LedgerService {
  constructor(
    private ledgerRepo: ILedgerRepository,
    private userRepo: IUserRepository
  ) {}

  /**
   * Create the standard chart of accounts (idempotent, runs at startup)
   */
  async ensureBasicAccounts(): Promise<number> {
    const created = await this.ledgerRepo.ensureAccounts(BASIC_ACCOUNTS);
    if (created > 0) {
      logger.info({ created }, 'Created missing ledger accounts');
    }
    return created;
  }

  async getAccountBalances(query: DateRangeQuery = {}): Promise<AccountBalance[]> {
    if (!query.startDate && !query.endDate) {
      return this.ledgerRepo.getAccountBalances();
    }

    const range = this.parseRange(query, new Date(0));
    return this.ledgerRepo.getAccountBalances(range);
  }

  async listRecentPayments(
    query: DateRangeQuery & { limit?: number } = {}
  ): Promise<{ payments: PaymentWithUser[]; range: DateRange }> {
    const range = this.parseRange(query, daysAgo(PAGINATION_LIMITS.RECENT_PAYMENTS_DEFAULT_DAYS));
    const limit = Math.min(
      query.limit ?? PAGINATION_LIMITS.RECENT_PAYMENTS_LIMIT,
      PAGINATION_LIMITS.MAX_RECENT_PAYMENTS_LIMIT
    );

    const payments = await this.ledgerRepo.listPayments(range, limit);
    return { payments, range };
  }

  async getPayment(
    paymentId: string
  ): Promise<{ payment: Payment; entries: LedgerEntryWithAccount[] }> {
    const payment = await this.ledgerRepo.findPaymentById(paymentId);
    if (!payment) {
      throw new NotFoundError('Payment not found');
    }

    const entries = await this.ledgerRepo.listEntriesForPayment(paymentId);
    return { payment, entries };
  }

  /**
   * Record a payment captured by Stripe
   */
  async processPayment(
    input: RecordPaymentInput
  ): Promise<{ payment: Payment; transaction: LedgerTransaction; message: string }> {
    const user = await this.userRepo.findUserById(input.userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    const existing = await this.ledgerRepo.findPaymentByExternalId(input.externalPaymentId);
    if (existing) {
      throw new BusinessRuleError('Payment already recorded');
    }

    const entityType = isEntityType(input.entityType) ? input.entityType : null;
    const property = input.property ?? null;
    const entityId = input.entityId ?? null;

    try {
      const result = await transaction(async (client) => {
        const payment = await this.ledgerRepo.createPayment(
          {
            externalProvider: PAYMENT_PROVIDERS.STRIPE,
            externalPaymentId: input.externalPaymentId,
            userId: input.userId,
            amount: toMoneyString(input.amount),
            status: PAYMENT_STATUSES.COMPLETED,
            paymentDate: new Date(),
            entityType,
            entityId,
            property,
          },
          client
        );

        const tx = await this.ledgerRepo.createTransaction(
          {
            type: TRANSACTION_TYPES.PAYMENT,
            paymentId: payment.id,
            totalAmount: toMoneyString(input.amount),
            status: PAYMENT_STATUSES.COMPLETED,
            reason: input.description,
          },
          client
        );

        await this.ledgerRepo.insertEntries(
          tx.id,
          payment.id,
          buildPaymentEntries({
            amount: input.amount,
            fee: input.stripeFee ?? null,
            revenueAccount: revenueAccountFor(input.entityType, property),
            entityLabel: input.entityType,
            description: input.description,
            relatedEntityType: entityType,
            relatedEntityId: entityId,
          }),
          client
        );

        return { payment, transaction: tx };
      });

      logger.info(
        { paymentId: result.payment.id, userId: input.userId, entityType: input.entityType },
        'Payment recorded'
      );
      metrics.incrementCounter('ledger.payments', 1, { entityType: input.entityType });
      return { ...result, message: 'Payment recorded successfully' };
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new BusinessRuleError('Payment already recorded');
      }
      throw error;
    }
  }

  /**
   * Record a Stripe payout to the bank account
   */
  async processPayout(
    input: RecordPayoutInput
  ): Promise<{ payment: Payment; transaction: LedgerTransaction; message: string }> {
    const existing = await this.ledgerRepo.findPaymentByExternalId(input.stripePayoutId);
    if (existing) {
      throw new BusinessRuleError('Payment already recorded');
    }

    const related = {
      relatedEntityType: ENTITY_TYPES.ADMINISTRATION,
      relatedEntityId: input.stripePayoutId,
    };

    const result = await transaction(async (client) => {
      const payment = await this.ledgerRepo.createPayment(
        {
          externalProvider: PAYMENT_PROVIDERS.STRIPE,
          externalPaymentId: input.stripePayoutId,
          userId: null,
          amount: toMoneyString(input.amount),
          status: PAYMENT_STATUSES.COMPLETED,
          paymentDate: new Date(),
          entityType: ENTITY_TYPES.ADMINISTRATION,
          entityId: input.stripePayoutId,
          property: null,
        },
        client
      );

      const tx = await this.ledgerRepo.createTransaction(
        {
          type: TRANSACTION_TYPES.PAYOUT,
          paymentId: payment.id,
          totalAmount: toMoneyString(input.amount),
          status: PAYMENT_STATUSES.COMPLETED,
          reason: input.description,
        },
        client
      );

      await this.ledgerRepo.insertEntries(
        tx.id,
        payment.id,
        [
          {
            accountName: ACCOUNT_NAMES.CASH,
            amount: toMoneyString(input.amount),
            description: `Stripe payout received: ${input.description}`,
            ...related,
          },
          {
            accountName: ACCOUNT_NAMES.STRIPE_ACCOUNT,
            amount: negateMoney(input.amount),
            description: `Stripe payout processed: ${input.description}`,
            ...related,
          },
        ],
        client
      );

      return { payment, transaction: tx };
    });

    logger.info({ paymentId: result.payment.id, payoutId: input.stripePayoutId }, 'Payout recorded');
    return { ...result, message: 'Payout recorded successfully' };
  }

  /**
   * Refund part or all of a completed payment
   *
   * Business Rules:
   * - Only completed payments can be refunded
   * - Refunds are cumulative; together they may not exceed the payment amount
   * - The payment becomes "refunded" once fully refunded
   */
  async processRefund(
    input: RefundInput,
    actorId: string
  ): Promise<{
    externalRefundId: string;
    transaction: LedgerTransaction;
    paymentStatus: PaymentStatus;
    message: string;
  }> {
    const amount = new Decimal(input.amount);

    try {
      const result = await transaction(async (client) => {
        const payment = await this.ledgerRepo.lockPayment(input.paymentId, client);
        if (!payment) {
          throw new NotFoundError('Payment not found');
        }
        if (payment.status !== PAYMENT_STATUSES.COMPLETED) {
          throw new BusinessRuleError('Only completed payments can be refunded');
        }

        const alreadyRefunded = new Decimal(
          await this.ledgerRepo.sumRefunds(payment.id, client)
        );
        const refundable = new Decimal(payment.amount).minus(alreadyRefunded);
        if (amount.gt(refundable)) {
          throw new BusinessRuleError('Refund amount exceeds refundable balance');
        }

        const entries = await this.ledgerRepo.listEntriesForPayment(payment.id, client);
        const revenueEntry = entries.find(
          (entry) =>
            entry.accountType === ACCOUNT_TYPES.REVENUE && new Decimal(entry.amount).gt(0)
        );

        const tx = await this.ledgerRepo.createTransaction(
          {
            type: TRANSACTION_TYPES.REFUND,
            paymentId: payment.id,
            totalAmount: toMoneyString(amount),
            status: PAYMENT_STATUSES.COMPLETED,
            reason: input.reason,
          },
          client
        );

        await this.ledgerRepo.insertEntries(
          tx.id,
          payment.id,
          buildRefundEntries({
            amount: input.amount,
            reason: input.reason,
            paymentId: payment.id,
            revenueAccount: revenueEntry?.accountName ?? null,
          }),
          client
        );

        let paymentStatus: PaymentStatus = payment.status;
        if (alreadyRefunded.plus(amount).eq(payment.amount)) {
          await this.ledgerRepo.updatePaymentStatus(
            payment.id,
            PAYMENT_STATUSES.REFUNDED,
            client
          );
          paymentStatus = PAYMENT_STATUSES.REFUNDED;
        }

        return { transaction: tx, paymentStatus };
      });

      const externalRefundId = `admin_refund_${ulid()}`;
      logger.info(
        {
          paymentId: input.paymentId,
          transactionId: result.transaction.id,
          externalRefundId,
          actorId,
          paymentStatus: result.paymentStatus,
        },
        'Refund processed'
      );
      metrics.incrementCounter('ledger.refunds', 1, { paymentStatus: result.paymentStatus });

      return { externalRefundId, ...result, message: 'Refund processed successfully' };
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      logger.error({ error, paymentId: input.paymentId, actorId }, 'Refund failed');
      throw new OperationFailedError('Failed to process refund', error);
    }
  }

  /**
   * Give a member credit through a virtual payment
   */
  async addCredit(
    input: CreditInput,
    actorId: string
  ): Promise<{ payment: Payment; transaction: LedgerTransaction; message: string }> {
    const user = await this.userRepo.findUserById(input.userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    const related = {
      relatedEntityType: input.entityType,
      relatedEntityId: input.entityId ?? null,
    };

    try {
      const result = await transaction(async (client) => {
        const payment = await this.ledgerRepo.createPayment(
          {
            externalProvider: PAYMENT_PROVIDERS.CREDIT,
            externalPaymentId: `credit_${ulid()}`,
            userId: input.userId,
            amount: toMoneyString(input.amount),
            status: PAYMENT_STATUSES.COMPLETED,
            paymentDate: new Date(),
            entityType: input.entityType,
            entityId: input.entityId ?? null,
            property: null,
          },
          client
        );

        const tx = await this.ledgerRepo.createTransaction(
          {
            type: TRANSACTION_TYPES.ADJUSTMENT,
            paymentId: payment.id,
            totalAmount: toMoneyString(input.amount),
            status: PAYMENT_STATUSES.COMPLETED,
            reason: input.reason,
          },
          client
        );

        await this.ledgerRepo.insertEntries(
          tx.id,
          payment.id,
          [
            {
              accountName: ACCOUNT_NAMES.ACCOUNTS_RECEIVABLE,
              amount: toMoneyString(input.amount),
              description: `Credit issued: ${input.reason}`,
              ...related,
            },
            {
              accountName: ACCOUNT_NAMES.CASH,
              amount: negateMoney(input.amount),
              description: `Customer credit liability: ${input.reason}`,
              ...related,
            },
          ],
          client
        );

        return { payment, transaction: tx };
      });

      logger.info(
        { paymentId: result.payment.id, userId: input.userId, actorId },
        'Credit added'
      );
      return { ...result, message: 'Credit added successfully' };
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      logger.error({ error, userId: input.userId, actorId }, 'Adding credit failed');
      throw new OperationFailedError('Failed to add credit', error);
    }
  }

  /**
   * Inclusive day range; a missing end means today
   */
  private parseRange(query: DateRangeQuery, defaultStart: Date): DateRange {
    const start = query.startDate ? parseIsoDate(query.startDate) : defaultStart;
    const endDay = query.endDate ? parseIsoDate(query.endDate) : new Date();

    if (!start || !endDay) {
      throw new ValidationError('Invalid date format');
    }
    if (start.getTime() > endDay.getTime()) {
      throw new ValidationError('Start date must be on or before end date');
    }

    return { start, end: startOfNextDay(endDay) };
  }
}
