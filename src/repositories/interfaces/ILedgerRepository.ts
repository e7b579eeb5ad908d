import { PoolClient } from 'pg';
import {
  AccountBalance,
  Payment,
  PaymentWithUser,
  LedgerTransaction,
  LedgerEntryWithAccount,
  NewLedgerEntry,
} from '@/models';
import {
  AccountType,
  PaymentProvider,
  PaymentStatus,
  TransactionType,
  EntityType,
  BookingProperty,
} from '@/constants/ledger';

export interface LedgerAccountSeed {
  name: string;
  accountType: AccountType;
  description: string;
}

/**
 * Inclusive start, exclusive end
 */
export interface DateRange {
  start: Date;
  end: Date;
}

export interface NewPayment {
  externalProvider: PaymentProvider;
  externalPaymentId: string;
  userId: string | null;
  amount: string;
  status: PaymentStatus;
  paymentDate: Date;
  entityType: EntityType | null;
  entityId: string | null;
  property: BookingProperty | null;
}

export interface NewLedgerTransaction {
  type: TransactionType;
  paymentId: string;
  totalAmount: string;
  status: string;
  reason: string | null;
}

/**
 * Ledger Repository Interface
 * Accounts, payments, transactions and entries
 */
export interface ILedgerRepository {
  /**
   * Insert the accounts that do not exist yet; returns how many were created
   */
  ensureAccounts(accounts: readonly LedgerAccountSeed[]): Promise<number>;

  /**
   * Every account with the sum of its entries, optionally limited to
   * entries whose payment falls in the range
   */
  getAccountBalances(range?: DateRange): Promise<AccountBalance[]>;

  listPayments(range: DateRange, limit: number): Promise<PaymentWithUser[]>;

  listPaymentsForUser(
    userId: string,
    limit: number,
    offset: number
  ): Promise<{ payments: Payment[]; totalCount: number }>;

  findPaymentById(paymentId: string, client?: PoolClient): Promise<Payment | null>;

  /**
   * SELECT ... FOR UPDATE; only meaningful inside a transaction
   */
  lockPayment(paymentId: string, client: PoolClient): Promise<Payment | null>;

  findPaymentByExternalId(externalPaymentId: string, client?: PoolClient): Promise<Payment | null>;

  createPayment(payment: NewPayment, client: PoolClient): Promise<Payment>;

  updatePaymentStatus(paymentId: string, status: PaymentStatus, client: PoolClient): Promise<void>;

  createTransaction(tx: NewLedgerTransaction, client: PoolClient): Promise<LedgerTransaction>;

  /**
   * Insert entries for a transaction; account names are resolved to ids
   */
  insertEntries(
    transactionId: string,
    paymentId: string,
    entries: readonly NewLedgerEntry[],
    client: PoolClient
  ): Promise<void>;

  listEntriesForPayment(paymentId: string, client?: PoolClient): Promise<LedgerEntryWithAccount[]>;

  /**
   * Sum of completed refund transactions against a payment ("0.00" when none)
   */
  sumRefunds(paymentId: string, client: PoolClient): Promise<string>;
}
