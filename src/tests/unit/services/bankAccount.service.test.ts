import { BankAccountService, toSafeView } from '@/services/bankAccount.service';
import {
  createMockBankAccountRepository,
  createMockExpenseReportRepository,
} from '@/tests/utils/mockRepositories';
import { buildBankAccount, buildUser } from '@/tests/utils/fixtures';
import { IBankAccountRepository, IExpenseReportRepository } from '@/repositories/interfaces';
import { FieldEncryptor } from '@/utils/encryption';
import { BusinessRuleError, NotFoundError, ValidationError } from '@/errors';

const USER_ID = '01HUSER0000000000000000001';
const TEST_KEY = Buffer.alloc(32, 3).toString('base64');

describe('BankAccountService', () => {
  let service: BankAccountService;
  let encryptor: FieldEncryptor;
  let mockBankAccountRepo: jest.Mocked<IBankAccountRepository>;
  let mockReportRepo: jest.Mocked<IExpenseReportRepository>;

  beforeEach(() => {
    encryptor = new FieldEncryptor(TEST_KEY);
    mockBankAccountRepo = createMockBankAccountRepository();
    mockReportRepo = createMockExpenseReportRepository();
    service = new BankAccountService(mockBankAccountRepo, mockReportRepo, encryptor);
  });

  it('should never expose the numbers in the safe view', () => {
    expect(toSafeView(buildBankAccount())).toEqual({
      id: '01HBANK0000000000000000001',
      userId: USER_ID,
      accountNumberLast4: '6789',
      insertedAt: new Date('2024-03-01T12:00:00.000Z'),
    });
  });

  describe('getMine', () => {
    it('should return null when the member has no account', async () => {
      mockBankAccountRepo.findByUserId.mockResolvedValue(null);

      await expect(service.getMine(USER_ID)).resolves.toBeNull();
    });
  });

  describe('upsertMine', () => {
    it('should store encrypted numbers and the last four digits', async () => {
      mockBankAccountRepo.upsertForUser.mockImplementation(async (userId, numbers) =>
        buildBankAccount({ userId, ...numbers })
      );

      const result = await service.upsertMine(USER_ID, {
        routingNumber: ' 011000015 ',
        accountNumber: '000123456789',
      });

      expect(result.message).toBe('Bank account saved');
      expect(result.bankAccount.accountNumberLast4).toBe('6789');

      const sealed = mockBankAccountRepo.upsertForUser.mock.calls[0]?.[1];

      expect(sealed?.accountNumberLast4).toBe('6789');
      expect(sealed?.routingNumberCiphertext).not.toContain('011000015');
      expect(encryptor.decrypt(sealed?.routingNumberCiphertext ?? '')).toBe('011000015');
      expect(encryptor.decrypt(sealed?.accountNumberCiphertext ?? '')).toBe('000123456789');
    });

    it('should report every invalid field', async () => {
      const error = await service
        .upsertMine(USER_ID, { routingNumber: '011000016', accountNumber: '12' })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty('errors', {
        fieldErrors: {
          routingNumber: ['is not a valid US routing number'],
          accountNumber: ['must be at least 4 digits'],
        },
      });
      expect(mockBankAccountRepo.upsertForUser).not.toHaveBeenCalled();
    });
  });

  describe('deleteMine', () => {
    it('should keep an account that an unpaid report still needs', async () => {
      mockBankAccountRepo.findByUserId.mockResolvedValue(buildBankAccount());
      mockReportRepo.countReportsUsingBankAccount.mockResolvedValue(1);

      await expect(service.deleteMine(USER_ID)).rejects.toThrow(
        new BusinessRuleError('Bank account is used by an expense report that has not been paid yet')
      );
      expect(mockReportRepo.countReportsUsingBankAccount).toHaveBeenCalledWith('01HBANK0000000000000000001', [
        'submitted',
        'approved',
      ]);
      expect(mockBankAccountRepo.deleteById).not.toHaveBeenCalled();
    });

    it('should remove an unused account', async () => {
      mockBankAccountRepo.findByUserId.mockResolvedValue(buildBankAccount());
      mockReportRepo.countReportsUsingBankAccount.mockResolvedValue(0);

      await expect(service.deleteMine(USER_ID)).resolves.toEqual({ message: 'Bank account removed' });
      expect(mockBankAccountRepo.deleteById).toHaveBeenCalledWith('01HBANK0000000000000000001');
    });

    it('should report a missing account', async () => {
      mockBankAccountRepo.findByUserId.mockResolvedValue(null);

      await expect(service.deleteMine(USER_ID)).rejects.toThrow(new NotFoundError('Bank account not found'));
    });
  });

  describe('unseal', () => {
    it('should decrypt both numbers for the viewer', async () => {
      mockBankAccountRepo.findById.mockResolvedValue(
        buildBankAccount({
          routingNumberCiphertext: encryptor.encrypt('021000021'),
          accountNumberCiphertext: encryptor.encrypt('987654321'),
          accountNumberLast4: '4321',
        })
      );

      const details = await service.unseal(
        '01HBANK0000000000000000001',
        buildUser({ id: '01HTREAS000000000000000001', boardPosition: 'treasurer' })
      );

      expect(details).toEqual({
        id: '01HBANK0000000000000000001',
        userId: USER_ID,
        accountNumberLast4: '4321',
        insertedAt: new Date('2024-03-01T12:00:00.000Z'),
        routingNumber: '021000021',
        accountNumber: '987654321',
      });
    });

    it('should report a missing account', async () => {
      mockBankAccountRepo.findById.mockResolvedValue(null);

      await expect(service.unseal('missing', buildUser({ boardPosition: 'treasurer' }))).rejects.toThrow(
        NotFoundError
      );
    });
  });
});
