import { PoolClient } from 'pg';
import {
  ExpenseReport,
  ExpenseReportFields,
  ExpenseReportSummary,
  ExpenseItem,
  IncomeItem,
  NewExpenseItem,
  NewIncomeItem,
  ExpenseTotals,
} from '@/models';
import { ExpenseReportStatus } from '@/constants/expenseReports';

export type ExpenseReportWithTotals = ExpenseReport & { totals: ExpenseTotals };

export interface ReportReview {
  status: ExpenseReportStatus;
  reviewedByUserId: string;
  reviewedAt: Date;
  reviewNote: string | null;
}

/**
 * Expense Report Repository Interface
 */
export interface IExpenseReportRepository {
  listByUser(userId: string): Promise<ExpenseReportWithTotals[]>;

  /**
   * Reports with submitter and totals, excluding drafts unless asked for
   */
  listForReview(status?: ExpenseReportStatus): Promise<ExpenseReportSummary[]>;

  findReportById(reportId: string, client?: PoolClient): Promise<ExpenseReport | null>;

  findItems(
    reportId: string,
    client?: PoolClient
  ): Promise<{ expenseItems: ExpenseItem[]; incomeItems: IncomeItem[] }>;

  createReport(userId: string, fields: ExpenseReportFields, client: PoolClient): Promise<ExpenseReport>;

  updateReport(reportId: string, fields: ExpenseReportFields, client: PoolClient): Promise<ExpenseReport>;

  /**
   * Delete existing items and income items, then insert the given ones
   */
  replaceItems(
    reportId: string,
    expenseItems: readonly NewExpenseItem[],
    incomeItems: readonly NewIncomeItem[],
    client: PoolClient
  ): Promise<void>;

  deleteReport(reportId: string, client?: PoolClient): Promise<void>;

  /**
   * Compare-and-set on status; null when the report is no longer in `fromStatus`
   */
  updateStatus(
    reportId: string,
    fromStatus: ExpenseReportStatus,
    review: ReportReview
  ): Promise<ExpenseReport | null>;

  /**
   * Reports in the given statuses that reference the bank account
   */
  countReportsUsingBankAccount(
    bankAccountId: string,
    statuses: readonly ExpenseReportStatus[]
  ): Promise<number>;
}
