/**
 * Expense report lifecycle
 */
export const EXPENSE_REPORT_STATUSES = {
  DRAFT: 'draft',
  SUBMITTED: 'submitted',
  APPROVED: 'approved',
  REJECTED: 'rejected',
  PAID: 'paid',
} as const;

export const REIMBURSEMENT_METHODS = {
  CHECK: 'check',
  BANK_TRANSFER: 'bank_transfer',
} as const;

export type ExpenseReportStatus =
  (typeof EXPENSE_REPORT_STATUSES)[keyof typeof EXPENSE_REPORT_STATUSES];
export type ReimbursementMethod =
  (typeof REIMBURSEMENT_METHODS)[keyof typeof REIMBURSEMENT_METHODS];

/**
 * Status changes a reviewer may apply
 * Drafts and submissions are owned by the member; everything after is the board's.
 */
export const REVIEW_TRANSITIONS: Readonly<Record<ExpenseReportStatus, readonly ExpenseReportStatus[]>> = {
  draft: [],
  submitted: ['approved', 'rejected'],
  approved: ['paid'],
  rejected: [],
  paid: [],
};

export const EXPENSE_REPORT_STATUS_VALUES = Object.values(EXPENSE_REPORT_STATUSES);
