import request from 'supertest';
import app from '@/app';
import { TestContainer } from '@/tests/utils/testContainer';
import { ADMIN, MEMBER, TREASURER, registerActingUsers } from '@/tests/utils/actingUsers';
import { buildBankAccount } from '@/tests/utils/fixtures';

jest.mock('@/config/database', () => ({
  transaction: jest.fn(),
}));

jest.mock('@/config/dependencies', () =>
  jest
    .requireActual<typeof import('@/tests/utils/testContainer')>('@/tests/utils/testContainer')
    .createTestContainer()
);

const container = jest.requireMock<TestContainer>('@/config/dependencies');

describe('Bank Accounts API', () => {
  beforeEach(() => {
    registerActingUsers(container.userRepository);
  });

  describe('GET /api/v1/bank-accounts', () => {
    it('should return null when the member has no account', async () => {
      container.bankAccountRepository.findByUserId.mockResolvedValueOnce(null);

      const response = await request(app)
        .get('/api/v1/bank-accounts')
        .set('X-User-Id', MEMBER.id)
        .expect(200);

      expect(response.body).toEqual({ bankAccount: null });
    });

    it('should never send the sealed numbers', async () => {
      container.bankAccountRepository.findByUserId.mockResolvedValueOnce(buildBankAccount());

      const response = await request(app)
        .get('/api/v1/bank-accounts')
        .set('X-User-Id', MEMBER.id)
        .expect(200);

      expect(response.body).toEqual({
        bankAccount: {
          id: '01HBANK0000000000000000001',
          userId: MEMBER.id,
          accountNumberLast4: '6789',
          insertedAt: '2024-03-01T12:00:00.000Z',
        },
      });
    });
  });

  describe('PUT /api/v1/bank-accounts', () => {
    it('should reject a routing number with a bad checksum', async () => {
      const response = await request(app)
        .put('/api/v1/bank-accounts')
        .set('X-User-Id', MEMBER.id)
        .send({ routingNumber: '123456789', accountNumber: '000123456789' })
        .expect(400);

      expect(response.body.error).toEqual({
        message: 'Invalid bank account',
        details: { fieldErrors: { routingNumber: ['is not a valid US routing number'] } },
      });
      expect(container.bankAccountRepository.upsertForUser).not.toHaveBeenCalled();
    });

    it('should save the account', async () => {
      container.bankAccountRepository.upsertForUser.mockImplementationOnce(async (userId, numbers) =>
        buildBankAccount({ userId, ...numbers })
      );

      const response = await request(app)
        .put('/api/v1/bank-accounts')
        .set('X-User-Id', MEMBER.id)
        .send({ routingNumber: '011000015', accountNumber: '000123454321' })
        .expect(200);

      expect(response.body.message).toBe('Bank account saved');
      expect(response.body.bankAccount.accountNumberLast4).toBe('4321');
    });
  });

  describe('DELETE /api/v1/bank-accounts', () => {
    it('should refuse while an unpaid report uses the account', async () => {
      container.bankAccountRepository.findByUserId.mockResolvedValueOnce(buildBankAccount());
      container.expenseReportRepository.countReportsUsingBankAccount.mockResolvedValueOnce(2);

      const response = await request(app)
        .delete('/api/v1/bank-accounts')
        .set('X-User-Id', MEMBER.id)
        .expect(422);

      expect(response.body.error.message).toBe(
        'Bank account is used by an expense report that has not been paid yet'
      );
    });
  });

  describe('GET /api/v1/admin/bank-accounts/:id/details', () => {
    it('should be closed to admins who are not the treasurer', async () => {
      await request(app)
        .get('/api/v1/admin/bank-accounts/01HBANK0000000000000000001/details')
        .set('X-User-Id', ADMIN.id)
        .expect(403);

      expect(container.bankAccountRepository.findById).not.toHaveBeenCalled();
    });

    it('should decrypt the numbers for the treasurer', async () => {
      container.bankAccountRepository.findById.mockResolvedValueOnce(
        buildBankAccount({
          routingNumberCiphertext: container.fieldEncryptor.encrypt('011000015'),
          accountNumberCiphertext: container.fieldEncryptor.encrypt('000123456789'),
        })
      );

      const response = await request(app)
        .get('/api/v1/admin/bank-accounts/01HBANK0000000000000000001/details')
        .set('X-User-Id', TREASURER.id)
        .expect(200);

      expect(response.body).toEqual({
        id: '01HBANK0000000000000000001',
        userId: MEMBER.id,
        accountNumberLast4: '6789',
        insertedAt: '2024-03-01T12:00:00.000Z',
        routingNumber: '011000015',
        accountNumber: '000123456789',
      });
    });
  });
});
