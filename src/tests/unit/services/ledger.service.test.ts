import {
  LedgerService,
  buildPaymentEntries,
  buildRefundEntries,
  revenueAccountFor,
} from '@/services/ledger.service';
import { createMockLedgerRepository, createMockUserRepository } from '@/tests/utils/mockRepositories';
import { buildPayment, buildUser } from '@/tests/utils/fixtures';
import { ILedgerRepository, IUserRepository } from '@/repositories/interfaces';
import { LedgerTransaction, LedgerEntryWithAccount } from '@/models';
import { NotFoundError, BusinessRuleError, ValidationError, OperationFailedError } from '@/errors';

// Run transaction callbacks immediately with a mock client
const mockClient = {
  query: jest.fn(),
};

jest.mock('@/config/database', () => ({
  transaction: jest.fn((callback: (client: typeof mockClient) => unknown) => callback(mockClient)),
}));

const PAYMENT_ID = '01HPAY00000000000000000001';
const ADMIN_ID = '01HADMIN000000000000000001';

function buildTransaction(overrides: Partial<LedgerTransaction> = {}): LedgerTransaction {
  return {
    id: '01HTX000000000000000000001',
    type: 'refund',
    paymentId: PAYMENT_ID,
    totalAmount: '0.00',
    status: 'completed',
    reason: null,
    insertedAt: new Date('2024-03-02T00:00:00.000Z'),
    ...overrides,
  };
}

function buildEntry(overrides: Partial<LedgerEntryWithAccount>): LedgerEntryWithAccount {
  return {
    id: '01HENTRY000000000000000001',
    accountId: '01HACCT0000000000000000001',
    paymentId: PAYMENT_ID,
    transactionId: '01HTX000000000000000000000',
    amount: '100.00',
    description: 'entry',
    relatedEntityType: 'membership',
    relatedEntityId: null,
    insertedAt: new Date('2024-03-01T00:00:00.000Z'),
    accountName: 'stripe_account',
    accountType: 'asset',
    ...overrides,
  };
}

describe('ledger entry builders', () => {
  it('should pick the revenue account for each entity type', () => {
    expect(revenueAccountFor('membership', null)).toBe('membership_revenue');
    expect(revenueAccountFor('event', null)).toBe('event_revenue');
    expect(revenueAccountFor('booking', 'tahoe')).toBe('tahoe_booking_revenue');
    expect(revenueAccountFor('booking', 'clear_lake')).toBe('clear_lake_booking_revenue');
    expect(revenueAccountFor('booking', null)).toBe('booking_revenue');
    expect(revenueAccountFor('donation', null)).toBe('donation_revenue');
    expect(revenueAccountFor('raffle', null)).toBe('membership_revenue');
  });

  it('should book a payment and its Stripe fee', () => {
    const entries = buildPaymentEntries({
      amount: '100',
      fee: '3.2',
      revenueAccount: 'event_revenue',
      entityLabel: 'event',
      description: 'Crayfish party',
      relatedEntityType: 'event',
      relatedEntityId: 'evt-1',
    });

    expect(entries.map(({ accountName, amount }) => [accountName, amount])).toEqual([
      ['stripe_account', '100.00'],
      ['event_revenue', '100.00'],
      ['stripe_fees', '3.20'],
      ['stripe_account', '-3.20'],
    ]);
    expect(entries[1]).toEqual({
      accountName: 'event_revenue',
      amount: '100.00',
      description: 'Revenue from event: Crayfish party',
      relatedEntityType: 'event',
      relatedEntityId: 'evt-1',
    });
  });

  it('should leave out fee entries for a zero fee', () => {
    const entries = buildPaymentEntries({
      amount: '45',
      fee: '0.00',
      revenueAccount: 'membership_revenue',
      entityLabel: 'membership',
      description: 'Annual membership',
      relatedEntityType: 'membership',
      relatedEntityId: null,
    });

    expect(entries).toHaveLength(2);
  });

  it('should reverse revenue on refund only when there was revenue', () => {
    const withRevenue = buildRefundEntries({
      amount: '25',
      reason: 'Cancelled',
      paymentId: PAYMENT_ID,
      revenueAccount: 'membership_revenue',
    });
    const withoutRevenue = buildRefundEntries({
      amount: '25',
      reason: 'Cancelled',
      paymentId: PAYMENT_ID,
      revenueAccount: null,
    });

    expect(withRevenue.map(({ accountName, amount }) => [accountName, amount])).toEqual([
      ['refund_expense', '25.00'],
      ['stripe_account', '-25.00'],
      ['membership_revenue', '-25.00'],
    ]);
    expect(withoutRevenue).toHaveLength(2);
    expect(withRevenue[0]).toEqual({
      accountName: 'refund_expense',
      amount: '25.00',
      description: 'Refund issued: Cancelled',
      relatedEntityType: 'administration',
      relatedEntityId: PAYMENT_ID,
    });
  });
});

describe('LedgerService', () => {
  let ledgerService: LedgerService;
  let mockLedgerRepo: jest.Mocked<ILedgerRepository>;
  let mockUserRepo: jest.Mocked<IUserRepository>;

  beforeEach(() => {
    mockLedgerRepo = createMockLedgerRepository();
    mockUserRepo = createMockUserRepository();
    ledgerService = new LedgerService(mockLedgerRepo, mockUserRepo);
  });

  describe('processRefund', () => {
    beforeEach(() => {
      mockLedgerRepo.lockPayment.mockResolvedValue(buildPayment());
      mockLedgerRepo.sumRefunds.mockResolvedValue('0.00');
      mockLedgerRepo.listEntriesForPayment.mockResolvedValue([
        buildEntry({ accountName: 'stripe_account', accountType: 'asset' }),
        buildEntry({ accountName: 'membership_revenue', accountType: 'revenue' }),
      ]);
      mockLedgerRepo.createTransaction.mockResolvedValue(buildTransaction({ totalAmount: '30.00' }));
    });

    it('should write a partial refund and keep the payment completed', async () => {
      const result = await ledgerService.processRefund(
        { paymentId: PAYMENT_ID, amount: '30.00', reason: 'Duplicate charge' },
        ADMIN_ID
      );

      expect(result.paymentStatus).toBe('completed');
      expect(result.message).toBe('Refund processed successfully');
      expect(result.externalRefundId).toMatch(/^admin_refund_[0-9A-Z]{26}$/);
      expect(mockLedgerRepo.createTransaction).toHaveBeenCalledWith(
        {
          type: 'refund',
          paymentId: PAYMENT_ID,
          totalAmount: '30.00',
          status: 'completed',
          reason: 'Duplicate charge',
        },
        mockClient
      );
      expect(mockLedgerRepo.insertEntries).toHaveBeenCalledWith(
        '01HTX000000000000000000001',
        PAYMENT_ID,
        buildRefundEntries({
          amount: '30.00',
          reason: 'Duplicate charge',
          paymentId: PAYMENT_ID,
          revenueAccount: 'membership_revenue',
        }),
        mockClient
      );
      expect(mockLedgerRepo.updatePaymentStatus).not.toHaveBeenCalled();
    });

    it('should mark the payment refunded once refunds reach its amount', async () => {
      mockLedgerRepo.sumRefunds.mockResolvedValue('70.00');

      const result = await ledgerService.processRefund(
        { paymentId: PAYMENT_ID, amount: '30.00', reason: 'Rest of the charge' },
        ADMIN_ID
      );

      expect(result.paymentStatus).toBe('refunded');
      expect(mockLedgerRepo.updatePaymentStatus).toHaveBeenCalledWith(PAYMENT_ID, 'refunded', mockClient);
    });

    it('should refuse refunds beyond the refundable balance', async () => {
      mockLedgerRepo.sumRefunds.mockResolvedValue('80.00');

      await expect(
        ledgerService.processRefund({ paymentId: PAYMENT_ID, amount: '30.00', reason: 'Too much' }, ADMIN_ID)
      ).rejects.toThrow(new BusinessRuleError('Refund amount exceeds refundable balance'));
      expect(mockLedgerRepo.createTransaction).not.toHaveBeenCalled();
    });

    it('should only refund completed payments', async () => {
      mockLedgerRepo.lockPayment.mockResolvedValue(buildPayment({ status: 'refunded' }));

      await expect(
        ledgerService.processRefund({ paymentId: PAYMENT_ID, amount: '1.00', reason: 'Again' }, ADMIN_ID)
      ).rejects.toThrow(new BusinessRuleError('Only completed payments can be refunded'));
    });

    it('should report unknown payments', async () => {
      mockLedgerRepo.lockPayment.mockResolvedValue(null);

      await expect(
        ledgerService.processRefund({ paymentId: 'missing', amount: '1.00', reason: 'Why' }, ADMIN_ID)
      ).rejects.toThrow(NotFoundError);
    });

    it('should wrap unexpected failures', async () => {
      mockLedgerRepo.insertEntries.mockRejectedValue(new Error('deadlock detected'));

      await expect(
        ledgerService.processRefund({ paymentId: PAYMENT_ID, amount: '1.00', reason: 'Why' }, ADMIN_ID)
      ).rejects.toThrow(new OperationFailedError('Failed to process refund'));
    });
  });

  describe('processPayment', () => {
    it('should refuse a payment that was already recorded', async () => {
      mockUserRepo.findUserById.mockResolvedValue(buildUser());
      mockLedgerRepo.findPaymentByExternalId.mockResolvedValue(buildPayment());

      await expect(
        ledgerService.processPayment({
          userId: '01HUSER0000000000000000001',
          amount: '45.00',
          entityType: 'membership',
          externalPaymentId: 'pi_test_1',
          description: 'Annual membership',
        })
      ).rejects.toThrow(new BusinessRuleError('Payment already recorded'));
    });

    it('should book unknown entity types as membership revenue', async () => {
      const payment = buildPayment({ entityType: null });
      mockUserRepo.findUserById.mockResolvedValue(buildUser());
      mockLedgerRepo.findPaymentByExternalId.mockResolvedValue(null);
      mockLedgerRepo.createPayment.mockResolvedValue(payment);
      mockLedgerRepo.createTransaction.mockResolvedValue(buildTransaction({ type: 'payment' }));

      const result = await ledgerService.processPayment({
        userId: '01HUSER0000000000000000001',
        amount: '10.00',
        entityType: 'raffle',
        externalPaymentId: 'pi_test_2',
        description: 'Raffle ticket',
      });

      expect(result.message).toBe('Payment recorded successfully');
      expect(mockLedgerRepo.createPayment).toHaveBeenCalledWith(
        expect.objectContaining({ entityType: null, amount: '10.00', externalProvider: 'stripe' }),
        mockClient
      );
      expect(mockLedgerRepo.insertEntries).toHaveBeenCalledWith(
        '01HTX000000000000000000001',
        payment.id,
        [
          expect.objectContaining({ accountName: 'stripe_account', amount: '10.00' }),
          expect.objectContaining({
            accountName: 'membership_revenue',
            amount: '10.00',
            description: 'Revenue from raffle: Raffle ticket',
          }),
        ],
        mockClient
      );
    });
  });

  describe('addCredit', () => {
    it('should debit receivables against cash', async () => {
      mockUserRepo.findUserById.mockResolvedValue(buildUser());
      mockLedgerRepo.createPayment.mockResolvedValue(buildPayment({ externalProvider: 'credit' }));
      mockLedgerRepo.createTransaction.mockResolvedValue(buildTransaction({ type: 'adjustment' }));

      const result = await ledgerService.addCredit(
        { userId: '01HUSER0000000000000000001', amount: '20.00', reason: 'Cabin cleanup', entityType: 'administration' },
        ADMIN_ID
      );

      expect(result.message).toBe('Credit added successfully');
      expect(mockLedgerRepo.createPayment).toHaveBeenCalledWith(
        expect.objectContaining({
          externalProvider: 'credit',
          externalPaymentId: expect.stringMatching(/^credit_[0-9A-Z]{26}$/),
        }),
        mockClient
      );
      expect(mockLedgerRepo.insertEntries).toHaveBeenCalledWith(
        expect.any(String),
        expect.any(String),
        [
          {
            accountName: 'accounts_receivable',
            amount: '20.00',
            description: 'Credit issued: Cabin cleanup',
            relatedEntityType: 'administration',
            relatedEntityId: null,
          },
          {
            accountName: 'cash',
            amount: '-20.00',
            description: 'Customer credit liability: Cabin cleanup',
            relatedEntityType: 'administration',
            relatedEntityId: null,
          },
        ],
        mockClient
      );
    });

    it('should require an existing user', async () => {
      mockUserRepo.findUserById.mockResolvedValue(null);

      await expect(
        ledgerService.addCredit(
          { userId: 'missing', amount: '20.00', reason: 'Cabin cleanup', entityType: 'administration' },
          ADMIN_ID
        )
      ).rejects.toThrow(new NotFoundError('User not found'));
    });
  });

  describe('processPayout', () => {
    it('should move the payout from Stripe to cash', async () => {
      mockLedgerRepo.findPaymentByExternalId.mockResolvedValue(null);
      mockLedgerRepo.createPayment.mockResolvedValue(buildPayment({ userId: null }));
      mockLedgerRepo.createTransaction.mockResolvedValue(buildTransaction({ type: 'payout' }));

      await ledgerService.processPayout({ amount: '500', stripePayoutId: 'po_test_1', description: 'Weekly payout' });

      expect(mockLedgerRepo.insertEntries).toHaveBeenCalledWith(
        expect.any(String),
        expect.any(String),
        [
          expect.objectContaining({ accountName: 'cash', amount: '500.00' }),
          expect.objectContaining({ accountName: 'stripe_account', amount: '-500.00' }),
        ],
        mockClient
      );
    });
  });

  describe('date ranges', () => {
    it('should make the end date inclusive', async () => {
      mockLedgerRepo.getAccountBalances.mockResolvedValue([]);

      await ledgerService.getAccountBalances({ startDate: '2024-01-01', endDate: '2024-01-31' });

      expect(mockLedgerRepo.getAccountBalances).toHaveBeenCalledWith({
        start: new Date('2024-01-01T00:00:00.000Z'),
        end: new Date('2024-02-01T00:00:00.000Z'),
      });
    });

    it('should use all-time balances without dates', async () => {
      mockLedgerRepo.getAccountBalances.mockResolvedValue([]);

      await ledgerService.getAccountBalances();

      expect(mockLedgerRepo.getAccountBalances).toHaveBeenCalledWith();
    });

    it('should reject inverted or malformed ranges', async () => {
      await expect(
        ledgerService.getAccountBalances({ startDate: '2024-02-01', endDate: '2024-01-01' })
      ).rejects.toThrow(new ValidationError('Start date must be on or before end date'));
      await expect(ledgerService.listRecentPayments({ startDate: 'last week' })).rejects.toThrow(
        new ValidationError('Invalid date format')
      );
    });

    it('should cap the number of recent payments', async () => {
      mockLedgerRepo.listPayments.mockResolvedValue([]);

      await ledgerService.listRecentPayments({ limit: 500 });

      expect(mockLedgerRepo.listPayments).toHaveBeenCalledWith(expect.any(Object), 200);
    });
  });
});
