import { ExpenseReportStatus, ReimbursementMethod } from '@/constants/expenseReports';

export interface ExpenseItem {
  id: string;
  expenseReportId: string;
  date: string; // YYYY-MM-DD
  vendor: string;
  description: string | null;
  amount: string;
  receiptS3Path: string | null;
}

export interface IncomeItem {
  id: string;
  expenseReportId: string;
  date: string;
  description: string;
  amount: string;
  proofS3Path: string | null;
}

/**
 * Expense report model
 * Matches the 'expense_reports' table
 */
export interface ExpenseReport {
  id: string;
  userId: string;
  purpose: string;
  eventId: string | null;
  reimbursementMethod: ReimbursementMethod;
  addressId: string | null;
  bankAccountId: string | null;
  status: ExpenseReportStatus;
  certificationAccepted: boolean;
  submittedAt: Date | null;
  reviewedByUserId: string | null;
  reviewedAt: Date | null;
  reviewNote: string | null;
  insertedAt: Date;
  updatedAt: Date;
}

export interface ExpenseTotals {
  expenseTotal: string;
  incomeTotal: string;
  netTotal: string;
}

export interface ExpenseReportWithItems extends ExpenseReport {
  expenseItems: ExpenseItem[];
  incomeItems: IncomeItem[];
  totals: ExpenseTotals;
}

export interface ExpenseReportSummary extends ExpenseReport {
  submitterEmail: string;
  submitterFirstName: string | null;
  submitterLastName: string | null;
  totals: ExpenseTotals;
}

export type NewExpenseItem = Omit<ExpenseItem, 'id' | 'expenseReportId'>;
export type NewIncomeItem = Omit<IncomeItem, 'id' | 'expenseReportId'>;

/**
 * Report columns written on create/update
 */
export interface ExpenseReportFields {
  purpose: string;
  eventId: string | null;
  reimbursementMethod: ReimbursementMethod;
  addressId: string | null;
  bankAccountId: string | null;
  status: ExpenseReportStatus;
  certificationAccepted: boolean;
  submittedAt: Date | null;
}

export interface Address {
  id: string;
  userId: string;
  address: string;
  city: string;
  region: string | null;
  postalCode: string;
  country: string;
  isBilling: boolean;
}

/**
 * Stored bank account; numbers are AES-256-GCM ciphertexts
 */
export interface BankAccount {
  id: string;
  userId: string;
  routingNumberCiphertext: string;
  accountNumberCiphertext: string;
  accountNumberLast4: string;
  insertedAt: Date;
  updatedAt: Date;
}

/**
 * Bank account view without sensitive numbers
 */
export interface BankAccountSafe {
  id: string;
  userId: string;
  accountNumberLast4: string;
  insertedAt: Date;
}

export interface BankAccountDetails extends BankAccountSafe {
  routingNumber: string;
  accountNumber: string;
}
