import { PoolClient } from 'pg';
import { ulid } from 'ulid';
import { query, queryWith } from '@/config/database';
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
import { ExpenseReportStatus, EXPENSE_REPORT_STATUSES } from '@/constants/expenseReports';
import { NotFoundError } from '@/errors';
import {
  IExpenseReportRepository,
  ExpenseReportWithTotals,
  ReportReview,
} from './interfaces/IExpenseReportRepository';

const REPORT_COLUMNS = `
  r.id,
  r.user_id AS "userId",
  r.purpose,
  r.event_id AS "eventId",
  r.reimbursement_method AS "reimbursementMethod",
  r.address_id AS "addressId",
  r.bank_account_id AS "bankAccountId",
  r.status,
  r.certification_accepted AS "certificationAccepted",
  r.submitted_at AS "submittedAt",
  r.reviewed_by_user_id AS "reviewedByUserId",
  r.reviewed_at AS "reviewedAt",
  r.review_note AS "reviewNote",
  r.inserted_at AS "insertedAt",
  r.updated_at AS "updatedAt"
`;

const TOTALS_JOINS = `
  LEFT JOIN LATERAL (
    SELECT COALESCE(SUM(amount), 0) AS total
    FROM expense_report_items
    WHERE expense_report_id = r.id
  ) expenses ON true
  LEFT JOIN LATERAL (
    SELECT COALESCE(SUM(amount), 0) AS total
    FROM expense_report_income_items
    WHERE expense_report_id = r.id
  ) income ON true
`;

const TOTALS_COLUMNS = `
  expenses.total::numeric(14, 2)::text AS "expenseTotal",
  income.total::numeric(14, 2)::text AS "incomeTotal",
  (expenses.total - income.total)::numeric(14, 2)::text AS "netTotal"
`;

function withTotals<T extends ExpenseTotals>(
  row: T
): Omit<T, keyof ExpenseTotals> & { totals: ExpenseTotals } {
  const { expenseTotal, incomeTotal, netTotal, ...rest } = row;
  return { ...rest, totals: { expenseTotal, incomeTotal, netTotal } };
}

/**
 * Expense Report Repository
 * Reports, expense items and income items
 */
export class ExpenseReportRepository implements IExpenseReportRepository {
  async listByUser(userId: string): Promise<ExpenseReportWithTotals[]> {
    const result = await query<ExpenseReport & ExpenseTotals>(
      `
      SELECT ${REPORT_COLUMNS}, ${TOTALS_COLUMNS}
      FROM expense_reports r
      ${TOTALS_JOINS}
      WHERE r.user_id = $1
      ORDER BY r.inserted_at DESC, r.id DESC
      `,
      [userId]
    );

    return result.rows.map(withTotals);
  }

  async listForReview(status?: ExpenseReportStatus): Promise<ExpenseReportSummary[]> {
    const result = await query<
      ExpenseReport &
        ExpenseTotals & {
          submitterEmail: string;
          submitterFirstName: string | null;
          submitterLastName: string | null;
        }
    >(
      `
      SELECT
        ${REPORT_COLUMNS},
        ${TOTALS_COLUMNS},
        u.email AS "submitterEmail",
        u.first_name AS "submitterFirstName",
        u.last_name AS "submitterLastName"
      FROM expense_reports r
      JOIN users u ON u.id = r.user_id
      ${TOTALS_JOINS}
      WHERE ($1::text IS NULL AND r.status <> $2) OR r.status = $1
      ORDER BY r.submitted_at DESC NULLS LAST, r.id DESC
      `,
      [status ?? null, EXPENSE_REPORT_STATUSES.DRAFT]
    );

    return result.rows.map(withTotals);
  }

  async findReportById(reportId: string, client?: PoolClient): Promise<ExpenseReport | null> {
    const result = await queryWith<ExpenseReport>(
      client,
      `SELECT ${REPORT_COLUMNS} FROM expense_reports r WHERE r.id = $1`,
      [reportId]
    );

    return result.rows[0] ?? null;
  }

  async findItems(
    reportId: string,
    client?: PoolClient
  ): Promise<{ expenseItems: ExpenseItem[]; incomeItems: IncomeItem[] }> {
    const expenseResult = await queryWith<ExpenseItem>(
      client,
      `
      SELECT
        id,
        expense_report_id AS "expenseReportId",
        date::text AS date,
        vendor,
        description,
        amount,
        receipt_s3_path AS "receiptS3Path"
      FROM expense_report_items
      WHERE expense_report_id = $1
      ORDER BY date ASC, id ASC
      `,
      [reportId]
    );

    const incomeResult = await queryWith<IncomeItem>(
      client,
      `
      SELECT
        id,
        expense_report_id AS "expenseReportId",
        date::text AS date,
        description,
        amount,
        proof_s3_path AS "proofS3Path"
      FROM expense_report_income_items
      WHERE expense_report_id = $1
      ORDER BY date ASC, id ASC
      `,
      [reportId]
    );

    return { expenseItems: expenseResult.rows, incomeItems: incomeResult.rows };
  }

  async createReport(
    userId: string,
    fields: ExpenseReportFields,
    client: PoolClient
  ): Promise<ExpenseReport> {
    const result = await client.query<ExpenseReport>(
      `
      INSERT INTO expense_reports AS r (
        id, user_id, purpose, event_id, reimbursement_method, address_id,
        bank_account_id, status, certification_accepted, submitted_at,
        inserted_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, NOW(), NOW())
      RETURNING ${REPORT_COLUMNS}
      `,
      [
        ulid(),
        userId,
        fields.purpose,
        fields.eventId,
        fields.reimbursementMethod,
        fields.addressId,
        fields.bankAccountId,
        fields.status,
        fields.certificationAccepted,
        fields.submittedAt,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Failed to insert expense report');
    }
    return row;
  }

  async updateReport(
    reportId: string,
    fields: ExpenseReportFields,
    client: PoolClient
  ): Promise<ExpenseReport> {
    const result = await client.query<ExpenseReport>(
      `
      UPDATE expense_reports r
      SET purpose = $2,
          event_id = $3,
          reimbursement_method = $4,
          address_id = $5,
          bank_account_id = $6,
          status = $7,
          certification_accepted = $8,
          submitted_at = $9,
          updated_at = NOW()
      WHERE r.id = $1
      RETURNING ${REPORT_COLUMNS}
      `,
      [
        reportId,
        fields.purpose,
        fields.eventId,
        fields.reimbursementMethod,
        fields.addressId,
        fields.bankAccountId,
        fields.status,
        fields.certificationAccepted,
        fields.submittedAt,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('Expense report not found');
    }
    return row;
  }

  async replaceItems(
    reportId: string,
    expenseItems: readonly NewExpenseItem[],
    incomeItems: readonly NewIncomeItem[],
    client: PoolClient
  ): Promise<void> {
    await client.query('DELETE FROM expense_report_items WHERE expense_report_id = $1', [reportId]);
    await client.query('DELETE FROM expense_report_income_items WHERE expense_report_id = $1', [
      reportId,
    ]);

    for (const item of expenseItems) {
      await client.query(
        `
        INSERT INTO expense_report_items
          (id, expense_report_id, date, vendor, description, amount, receipt_s3_path)
        VALUES ($1, $2, $3, $4, $5, $6, $7)
        `,
        [ulid(), reportId, item.date, item.vendor, item.description, item.amount, item.receiptS3Path]
      );
    }

    for (const item of incomeItems) {
      await client.query(
        `
        INSERT INTO expense_report_income_items
          (id, expense_report_id, date, description, amount, proof_s3_path)
        VALUES ($1, $2, $3, $4, $5, $6)
        `,
        [ulid(), reportId, item.date, item.description, item.amount, item.proofS3Path]
      );
    }
  }

  async deleteReport(reportId: string, client?: PoolClient): Promise<void> {
    await queryWith(client, 'DELETE FROM expense_report_items WHERE expense_report_id = $1', [
      reportId,
    ]);
    await queryWith(
      client,
      'DELETE FROM expense_report_income_items WHERE expense_report_id = $1',
      [reportId]
    );
    await queryWith(client, 'DELETE FROM expense_reports WHERE id = $1', [reportId]);
  }

  /**
   * Applies the review only while the report is still in `fromStatus`;
   * null when another reviewer moved it first
   */
  async updateStatus(
    reportId: string,
    fromStatus: ExpenseReportStatus,
    review: ReportReview
  ): Promise<ExpenseReport | null> {
    const result = await query<ExpenseReport>(
      `
      UPDATE expense_reports r
      SET status = $2,
          reviewed_by_user_id = $3,
          reviewed_at = $4,
          review_note = $5,
          updated_at = NOW()
      WHERE r.id = $1 AND r.status = $6
      RETURNING ${REPORT_COLUMNS}
      `,
      [
        reportId,
        review.status,
        review.reviewedByUserId,
        review.reviewedAt,
        review.reviewNote,
        fromStatus,
      ]
    );

    return result.rows[0] ?? null;
  }

  async countReportsUsingBankAccount(
    bankAccountId: string,
    statuses: readonly ExpenseReportStatus[]
  ): Promise<number> {
    const result = await query<{ count: number }>(
      `
      SELECT COUNT(*)::int AS count
      FROM expense_reports
      WHERE bank_account_id = $1 AND status = ANY($2::text[])
      `,
      [bankAccountId, [...statuses]]
    );

    return result.rows[0]?.count ?? 0;
  }
}
