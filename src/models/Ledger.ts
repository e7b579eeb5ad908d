import {
  AccountType,
  PaymentStatus,
  PaymentProvider,
  TransactionType,
  EntityType,
  BookingProperty,
} from '@/constants/ledger';

/**
 * Ledger account
 * Money values are NUMERIC in PostgreSQL and strings here (use Decimal.js)
 */
export interface LedgerAccount {
  id: string;
  name: string;
  accountType: AccountType;
  description: string;
}

export interface AccountBalance extends LedgerAccount {
  balance: string;
}

export interface Payment {
  id: string;
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

export interface PaymentWithUser extends Payment {
  userEmail: string | null;
  userFirstName: string | null;
  userLastName: string | null;
}

export interface LedgerTransaction {
  id: string;
  type: TransactionType;
  paymentId: string;
  totalAmount: string;
  status: string;
  reason: string | null;
  insertedAt: Date;
}

export interface LedgerEntry {
  id: string;
  accountId: string;
  paymentId: string;
  transactionId: string;
  amount: string; // signed, in the account's natural direction
  description: string;
  relatedEntityType: EntityType | null;
  relatedEntityId: string | null;
  insertedAt: Date;
}

export interface LedgerEntryWithAccount extends LedgerEntry {
  accountName: string;
  accountType: AccountType;
}

/**
 * Entry to be written; id and timestamps are assigned on insert
 */
export interface NewLedgerEntry {
  accountName: string;
  amount: string;
  description: string;
  relatedEntityType: EntityType | null;
  relatedEntityId: string | null;
}

/**
 * Kind of purchase a payment was for, shown in a member's payment history
 */
export type PaymentKind = 'membership' | 'ticket' | 'booking' | 'donation' | 'unknown';

export interface UserPaymentItem {
  payment: Payment;
  type: PaymentKind;
  description: string;
}
