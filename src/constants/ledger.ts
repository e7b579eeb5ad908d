/**
 * Ledger account types
 */
export const ACCOUNT_TYPES = {
  ASSET: 'asset',
  LIABILITY: 'liability',
  REVENUE: 'revenue',
  EXPENSE: 'expense',
} as const;

/**
 * Names of the accounts the ledger writes to directly
 * The full set (with descriptions) is seeded from data/ledgerAccounts.json
 */
export const ACCOUNT_NAMES = {
  CASH: 'cash',
  STRIPE_ACCOUNT: 'stripe_account',
  ACCOUNTS_RECEIVABLE: 'accounts_receivable',
  MEMBERSHIP_REVENUE: 'membership_revenue',
  EVENT_REVENUE: 'event_revenue',
  BOOKING_REVENUE: 'booking_revenue',
  TAHOE_BOOKING_REVENUE: 'tahoe_booking_revenue',
  CLEAR_LAKE_BOOKING_REVENUE: 'clear_lake_booking_revenue',
  DONATION_REVENUE: 'donation_revenue',
  STRIPE_FEES: 'stripe_fees',
  REFUND_EXPENSE: 'refund_expense',
} as const;

export const PAYMENT_STATUSES = {
  PENDING: 'pending',
  COMPLETED: 'completed',
  REFUNDED: 'refunded',
  FAILED: 'failed',
} as const;

export const PAYMENT_PROVIDERS = {
  STRIPE: 'stripe',
  CREDIT: 'credit',
} as const;

export const TRANSACTION_TYPES = {
  PAYMENT: 'payment',
  REFUND: 'refund',
  PAYOUT: 'payout',
  ADJUSTMENT: 'adjustment',
} as const;

/**
 * What a payment or ledger entry relates to
 */
export const ENTITY_TYPES = {
  ADMINISTRATION: 'administration',
  EVENT: 'event',
  MEMBERSHIP: 'membership',
  BOOKING: 'booking',
  DONATION: 'donation',
} as const;

export const BOOKING_PROPERTIES = {
  TAHOE: 'tahoe',
  CLEAR_LAKE: 'clear_lake',
} as const;

// Type exports
export type AccountType = (typeof ACCOUNT_TYPES)[keyof typeof ACCOUNT_TYPES];
export type PaymentStatus = (typeof PAYMENT_STATUSES)[keyof typeof PAYMENT_STATUSES];
export type PaymentProvider = (typeof PAYMENT_PROVIDERS)[keyof typeof PAYMENT_PROVIDERS];
export type TransactionType = (typeof TRANSACTION_TYPES)[keyof typeof TRANSACTION_TYPES];
export type EntityType = (typeof ENTITY_TYPES)[keyof typeof ENTITY_TYPES];
export type BookingProperty = (typeof BOOKING_PROPERTIES)[keyof typeof BOOKING_PROPERTIES];

export const ENTITY_TYPE_VALUES = Object.values(ENTITY_TYPES);
