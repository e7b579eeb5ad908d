import { refundSchema, creditSchema, recordPaymentSchema } from '@/validators/money.validator';

function amountErrors(amount: unknown): string[] | undefined {
  const result = refundSchema.safeParse({ paymentId: '01HPAY00000000000000000001', amount, reason: 'Duplicate charge' });
  return result.success ? undefined : result.error.flatten().fieldErrors.amount;
}

describe('money validators', () => {
  describe('amount', () => {
    it('should normalize accepted amounts to two decimals', () => {
      const result = refundSchema.safeParse({
        paymentId: '01HPAY00000000000000000001',
        amount: '$1,200.5',
        reason: 'Duplicate charge',
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.amount).toBe('1200.50');
      }
    });

    it('should reject blank, malformed, non-positive and oversized amounts', () => {
      expect(amountErrors(undefined)).toEqual(["can't be blank"]);
      expect(amountErrors('  ')).toEqual(["can't be blank"]);
      expect(amountErrors('12.345')).toEqual(['invalid amount format']);
      expect(amountErrors({ value: 5 })).toEqual(['invalid amount format']);
      expect(amountErrors('0')).toEqual(['must be positive']);
      expect(amountErrors('-5')).toEqual(['must be positive']);
      expect(amountErrors('1000000.01')).toEqual(['must be at most 1000000']);
    });
  });

  describe('reason', () => {
    it('should require a reason of at most 1000 characters', () => {
      const blank = refundSchema.safeParse({ paymentId: 'p1', amount: '5', reason: '   ' });
      const tooLong = refundSchema.safeParse({ paymentId: 'p1', amount: '5', reason: 'x'.repeat(1001) });

      expect(blank.success).toBe(false);
      expect(tooLong.success).toBe(false);
      if (!blank.success && !tooLong.success) {
        expect(blank.error.flatten().fieldErrors.reason).toEqual(["can't be blank"]);
        expect(tooLong.error.flatten().fieldErrors.reason).toEqual([
          'should be at most 1000 character(s)',
        ]);
      }
    });
  });

  it('should default credits to administration', () => {
    const result = creditSchema.parse({ userId: 'u1', amount: '20', reason: 'Cabin cleanup' });

    expect(result).toEqual({
      userId: 'u1',
      amount: '20.00',
      reason: 'Cabin cleanup',
      entityType: 'administration',
    });
  });

  it('should turn a missing stripe fee into null', () => {
    const result = recordPaymentSchema.parse({
      userId: 'u1',
      amount: '100',
      entityType: 'membership',
      externalPaymentId: 'pi_test_1',
      description: 'Annual membership',
    });

    expect(result.stripeFee).toBeNull();
    expect(result.amount).toBe('100.00');
  });
});
