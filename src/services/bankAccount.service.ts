import { BankAccount, BankAccountSafe, BankAccountDetails, User } from '@/models';
import { EXPENSE_REPORT_STATUSES } from '@/constants/expenseReports';
import { BusinessRuleError, NotFoundError, ValidationError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IBankAccountRepository, IExpenseReportRepository } from '@/repositories/interfaces';
import { FieldEncryptor } from '@/utils/encryption';
import { accountNumberErrors, lastFour, routingNumberErrors } from '@/utils/bankNumbers';

const logger = createLogger('BankAccountService');

/**
 * Reports in these statuses still need the account to be paid out
 */
const OPEN_REPORT_STATUSES = [
  EXPENSE_REPORT_STATUSES.SUBMITTED,
  EXPENSE_REPORT_STATUSES.APPROVED,
] as const;

export function toSafeView(account: BankAccount): BankAccountSafe {
  return {
    id: account.id,
    userId: account.userId,
    accountNumberLast4: account.accountNumberLast4,
    insertedAt: account.insertedAt,
  };
}

/**
 * Bank Account Service
 * Members keep one reimbursement account; numbers are stored encrypted and
 * only the treasurer can read them back.
 */
export class BankAccountService {
  constructor(
    private bankAccountRepo: IBankAccountRepository,
    private reportRepo: IExpenseReportRepository,
    private encryptor: FieldEncryptor
  ) {}

  async getMine(userId: string): Promise<BankAccountSafe | null> {
    const account = await this.bankAccountRepo.findByUserId(userId);
    return account ? toSafeView(account) : null;
  }

  async upsertMine(
    userId: string,
    numbers: { routingNumber: string; accountNumber: string }
  ): Promise<{ bankAccount: BankAccountSafe; message: string }> {
    const routingNumber = numbers.routingNumber.trim();
    const accountNumber = numbers.accountNumber.trim();

    const fieldErrors: Record<string, string[]> = {};
    const routingErrors = routingNumberErrors(routingNumber);
    const accountErrors = accountNumberErrors(accountNumber);
    if (routingErrors.length > 0) fieldErrors.routingNumber = routingErrors;
    if (accountErrors.length > 0) fieldErrors.accountNumber = accountErrors;

    if (Object.keys(fieldErrors).length > 0) {
      throw new ValidationError('Invalid bank account', { fieldErrors });
    }

    const account = await this.bankAccountRepo.upsertForUser(userId, {
      routingNumberCiphertext: this.encryptor.encrypt(routingNumber),
      accountNumberCiphertext: this.encryptor.encrypt(accountNumber),
      accountNumberLast4: lastFour(accountNumber),
    });

    logger.info({ userId, bankAccountId: account.id }, 'Bank account saved');
    return { bankAccount: toSafeView(account), message: 'Bank account saved' };
  }

  async deleteMine(userId: string): Promise<{ message: string }> {
    const account = await this.bankAccountRepo.findByUserId(userId);
    if (!account) {
      throw new NotFoundError('Bank account not found');
    }

    const openReports = await this.reportRepo.countReportsUsingBankAccount(
      account.id,
      OPEN_REPORT_STATUSES
    );
    if (openReports > 0) {
      throw new BusinessRuleError(
        'Bank account is used by an expense report that has not been paid yet'
      );
    }

    await this.bankAccountRepo.deleteById(account.id);
    logger.info({ userId, bankAccountId: account.id }, 'Bank account removed');
    return { message: 'Bank account removed' };
  }

  /**
   * Decrypt an account for payout; every call is audit-logged
   */
  async unseal(bankAccountId: string, viewer: User): Promise<BankAccountDetails> {
    const account = await this.bankAccountRepo.findById(bankAccountId);
    if (!account) {
      throw new NotFoundError('Bank account not found');
    }

    const details: BankAccountDetails = {
      ...toSafeView(account),
      routingNumber: this.encryptor.decrypt(account.routingNumberCiphertext),
      accountNumber: this.encryptor.decrypt(account.accountNumberCiphertext),
    };

    logger.info(
      {
        audit: true,
        bankAccountId,
        ownerId: account.userId,
        viewerId: viewer.id,
        viewerBoardPosition: viewer.boardPosition,
      },
      'Bank account details unsealed'
    );

    return details;
  }
}
