import { transaction } from '@/config/database';
import { EXPENSE_RULES } from '@/config/businessRules';
import {
  ExpenseReport,
  ExpenseReportFields,
  ExpenseReportSummary,
  ExpenseReportWithItems,
  ExpenseTotals,
  BankAccountSafe,
  NewExpenseItem,
  NewIncomeItem,
} from '@/models';
import {
  EXPENSE_REPORT_STATUSES,
  REIMBURSEMENT_METHODS,
  REVIEW_TRANSITIONS,
  ExpenseReportStatus,
  ReimbursementMethod,
} from '@/constants/expenseReports';
import { BusinessRuleError, NotFoundError, ValidationError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IObjectStorage } from '@/interfaces/IObjectStorage';
import {
  IExpenseReportRepository,
  IBankAccountRepository,
  IAddressRepository,
  IUserRepository,
  ExpenseReportWithTotals,
} from '@/repositories/interfaces';
import { sumMoney, toMoneyString } from '@/utils/money';
import { NotificationService } from './notification.service';
import { sanitizeFileName } from './media.service';
import { toSafeView } from './bankAccount.service';

const logger = createLogger('ExpenseReportService');

export interface ExpenseReportInput {
  purpose: string;
  eventId?: string | null;
  reimbursementMethod: ReimbursementMethod;
  addressId?: string | null;
  bankAccountId?: string | null;
  certificationAccepted: boolean;
  status: 'draft' | 'submitted';
  expenseItems: NewExpenseItem[];
  incomeItems: NewIncomeItem[];
}

export interface ReceiptUpload {
  originalName: string;
  mimeType: string;
  size: number;
  buffer: Buffer;
}

/**
 * expense total, income total, and net = expenses - income
 */
export function computeExpenseTotals(
  expenseItems: ReadonlyArray<{ amount: string }>,
  incomeItems: ReadonlyArray<{ amount: string }>
): ExpenseTotals {
  const expenseTotal = sumMoney(expenseItems.map((item) => item.amount));
  const incomeTotal = sumMoney(incomeItems.map((item) => item.amount));

  return {
    expenseTotal: toMoneyString(expenseTotal),
    incomeTotal: toMoneyString(incomeTotal),
    netTotal: toMoneyString(expenseTotal.minus(incomeTotal)),
  };
}

class FieldErrors {
  private errors: Record<string, string[]> = {};

  add(field: string, message: string): void {
    (this.errors[field] ??= []).push(message);
  }

  get isEmpty(): boolean {
    return Object.keys(this.errors).length === 0;
  }

  toJSON(): { fieldErrors: Record<string, string[]> } {
    return { fieldErrors: this.errors };
  }
}

/**
 * Expense Report Service
 * Member reimbursement requests and their review by the board
 */
export class ExpenseReportService {
  constructor(
    private reportRepo: IExpenseReportRepository,
    private bankAccountRepo: IBankAccountRepository,
    private addressRepo: IAddressRepository,
    private userRepo: IUserRepository,
    private storage: IObjectStorage,
    private notifications: NotificationService
  ) {}

  async listMyReports(userId: string): Promise<ExpenseReportWithTotals[]> {
    return this.reportRepo.listByUser(userId);
  }

  async getReport(userId: string, reportId: string): Promise<ExpenseReportWithItems> {
    const report = await this.findOwnReport(userId, reportId);
    return this.withItems(report);
  }

  async createReport(
    userId: string,
    input: ExpenseReportInput
  ): Promise<{ report: ExpenseReportWithItems; message: string }> {
    const fields = await this.prepareFields(userId, input);

    const report = await transaction(async (client) => {
      const created = await this.reportRepo.createReport(userId, fields, client);
      await this.reportRepo.replaceItems(
        created.id,
        input.expenseItems,
        input.incomeItems,
        client
      );
      return created;
    });

    return this.afterSave(userId, report);
  }

  /**
   * Replace a draft; submitting it runs the submission checks again
   */
  async updateReport(
    userId: string,
    reportId: string,
    input: ExpenseReportInput
  ): Promise<{ report: ExpenseReportWithItems; message: string }> {
    const existing = await this.findOwnReport(userId, reportId);
    if (existing.status !== EXPENSE_REPORT_STATUSES.DRAFT) {
      throw new BusinessRuleError('Only draft reports can be edited');
    }

    const fields = await this.prepareFields(userId, input);

    const report = await transaction(async (client) => {
      const updated = await this.reportRepo.updateReport(reportId, fields, client);
      await this.reportRepo.replaceItems(reportId, input.expenseItems, input.incomeItems, client);
      return updated;
    });

    return this.afterSave(userId, report);
  }

  async deleteReport(userId: string, reportId: string): Promise<{ message: string }> {
    const report = await this.findOwnReport(userId, reportId);
    if (report.status !== EXPENSE_REPORT_STATUSES.DRAFT) {
      throw new BusinessRuleError('Only draft reports can be deleted');
    }

    await transaction(async (client) => {
      await this.reportRepo.deleteReport(reportId, client);
    });

    logger.info({ userId, reportId }, 'Expense report deleted');
    return { message: 'Expense report deleted' };
  }

  /**
   * Store a receipt or proof of income in the expense bucket
   */
  async uploadReceipt(userId: string, file: ReceiptUpload): Promise<{ s3Path: string }> {
    if (!EXPENSE_RULES.ACCEPTED_RECEIPT_TYPES.some((type) => type === file.mimeType)) {
      throw new ValidationError('You have selected an unacceptable file type');
    }
    if (file.size > EXPENSE_RULES.MAX_RECEIPT_SIZE_BYTES) {
      throw new ValidationError('Too large');
    }

    const timestamp = Math.floor(Date.now() / 1000);
    const s3Path = `receipts/${timestamp}_${sanitizeFileName(file.originalName)}`;

    await this.storage.putObject(s3Path, file.buffer, file.mimeType);
    logger.info({ userId, s3Path, size: file.size }, 'Receipt uploaded');

    return { s3Path };
  }

  async listForReview(status?: ExpenseReportStatus): Promise<ExpenseReportSummary[]> {
    return this.reportRepo.listForReview(status);
  }

  async getReportForReview(
    reportId: string
  ): Promise<ExpenseReportWithItems & { bankAccount: BankAccountSafe | null }> {
    const report = await this.reportRepo.findReportById(reportId);
    if (!report) {
      throw new NotFoundError('Expense report not found');
    }

    const bankAccount = report.bankAccountId
      ? await this.bankAccountRepo.findById(report.bankAccountId)
      : null;

    return {
      ...(await this.withItems(report)),
      bankAccount: bankAccount ? toSafeView(bankAccount) : null,
    };
  }

  /**
   * submitted → approved | rejected, approved → paid
   */
  async changeStatus(
    reportId: string,
    change: { status: ExpenseReportStatus; note?: string | null },
    reviewerId: string
  ): Promise<{ report: ExpenseReport; message: string }> {
    const report = await this.reportRepo.findReportById(reportId);
    if (!report) {
      throw new NotFoundError('Expense report not found');
    }

    if (!REVIEW_TRANSITIONS[report.status].includes(change.status)) {
      throw new BusinessRuleError(`Cannot change status from ${report.status} to ${change.status}`);
    }

    const updated = await this.reportRepo.updateStatus(reportId, report.status, {
      status: change.status,
      reviewedByUserId: reviewerId,
      reviewedAt: new Date(),
      reviewNote: change.note ?? null,
    });
    if (!updated) {
      throw new BusinessRuleError('Expense report status was changed by another reviewer');
    }

    logger.info(
      { reportId, reviewerId, from: report.status, to: change.status },
      'Expense report status changed'
    );

    const submitter = await this.userRepo.findUserById(report.userId);
    if (submitter) {
      await this.notifications.expenseReportStatusChanged(
        submitter,
        updated,
        change.status,
        change.note ?? null
      );
    }

    return { report: updated, message: `Expense report ${change.status}` };
  }

  private async findOwnReport(userId: string, reportId: string): Promise<ExpenseReport> {
    const report = await this.reportRepo.findReportById(reportId);
    if (!report || report.userId !== userId) {
      throw new NotFoundError('Expense report not found');
    }
    return report;
  }

  private async withItems(report: ExpenseReport): Promise<ExpenseReportWithItems> {
    const { expenseItems, incomeItems } = await this.reportRepo.findItems(report.id);
    return {
      ...report,
      expenseItems,
      incomeItems,
      totals: computeExpenseTotals(expenseItems, incomeItems),
    };
  }

  private async afterSave(
    userId: string,
    report: ExpenseReport
  ): Promise<{ report: ExpenseReportWithItems; message: string }> {
    const full = await this.withItems(report);
    const submitted = report.status === EXPENSE_REPORT_STATUSES.SUBMITTED;

    logger.info({ userId, reportId: report.id, status: report.status }, 'Expense report saved');

    if (submitted) {
      const user = await this.userRepo.findUserById(userId);
      if (user) {
        await this.notifications.expenseReportSubmitted(user, report, full.totals.netTotal);
      }
    }

    return {
      report: full,
      message: submitted ? 'Expense report submitted' : 'Expense report saved as draft',
    };
  }

  /**
   * Ownership checks always; submission checks when the status is submitted.
   * A check reimbursement without an address uses the member's billing address.
   */
  private async prepareFields(
    userId: string,
    input: ExpenseReportInput
  ): Promise<ExpenseReportFields> {
    const errors = new FieldErrors();
    let addressId = input.addressId ?? null;
    const bankAccountId = input.bankAccountId ?? null;
    const submitting = input.status === EXPENSE_REPORT_STATUSES.SUBMITTED;

    if (addressId) {
      const address = await this.addressRepo.findById(addressId);
      if (!address || address.userId !== userId) {
        errors.add('addressId', 'is invalid');
      }
    }

    if (bankAccountId) {
      const account = await this.bankAccountRepo.findById(bankAccountId);
      if (!account || account.userId !== userId) {
        errors.add('bankAccountId', 'does not belong to you');
      }
    }

    if (submitting) {
      if (input.expenseItems.length === 0) {
        errors.add('expenseItems', 'Add at least one expense item');
      } else if (input.expenseItems.some((item) => !item.receiptS3Path)) {
        errors.add(
          'expenseItems',
          'All expense items must have a receipt attached before submission'
        );
      }

      if (!input.certificationAccepted) {
        errors.add('certificationAccepted', 'You must accept the certification to submit');
      }

      if (input.reimbursementMethod === REIMBURSEMENT_METHODS.BANK_TRANSFER && !bankAccountId) {
        const ownAccount = await this.bankAccountRepo.findByUserId(userId);
        if (ownAccount) {
          errors.add('bankAccountId', 'must be selected. Please choose a bank account above.');
        } else {
          errors.add(
            'reimbursementMethod',
            'requires a bank account. Please add a bank account in your user settings before submitting.'
          );
        }
      }

      if (input.reimbursementMethod === REIMBURSEMENT_METHODS.CHECK && !addressId) {
        const billing = await this.addressRepo.findBillingAddress(userId);
        if (billing) {
          addressId = billing.id;
        } else {
          errors.add(
            'reimbursementMethod',
            'requires a billing address. Please add an address in your user settings before submitting.'
          );
        }
      }
    }

    if (!errors.isEmpty) {
      throw new ValidationError('Invalid expense report', errors.toJSON());
    }

    return {
      purpose: input.purpose,
      eventId: input.eventId ?? null,
      reimbursementMethod: input.reimbursementMethod,
      addressId,
      bankAccountId,
      certificationAccepted: input.certificationAccepted,
      status: input.status,
      submittedAt: submitting ? new Date() : null,
    };
  }
}
