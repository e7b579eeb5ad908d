import { commaSeparated, isoDateSchema, pageSizeSchema } from '@/validators/common';
import { expenseReportSchema } from '@/validators/expenseReport.validator';

describe('common validators', () => {
  const statesSchema = commaSeparated(['active', 'suspended', 'deleted']);

  it('should split comma-separated filters and drop empty entries', () => {
    expect(statesSchema.parse('active, suspended,')).toEqual(['active', 'suspended']);
  });

  it('should treat a missing or empty filter as no filter', () => {
    expect(statesSchema.parse(undefined)).toBeUndefined();
    expect(statesSchema.parse('')).toBeUndefined();
    expect(statesSchema.parse(',')).toBeUndefined();
  });

  it('should reject unknown values', () => {
    expect(statesSchema.safeParse('active,bogus').success).toBe(false);
  });

  it('should cap the page size', () => {
    expect(pageSizeSchema.parse(undefined)).toBe(20);
    expect(pageSizeSchema.parse('50')).toBe(50);
    expect(pageSizeSchema.safeParse('101').success).toBe(false);
  });

  describe('isoDateSchema', () => {
    it('should accept real calendar dates', () => {
      expect(isoDateSchema.parse(' 2024-02-29 ')).toBe('2024-02-29');
    });

    it('should refuse impossible dates', () => {
      for (const value of ['2024-02-30', '2024-13-45', '2023-02-29', '24-02-01']) {
        const result = isoDateSchema.safeParse(value);
        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.issues.map((issue) => issue.message)).toEqual(['Invalid date format']);
        }
      }
    });

    it('should report an impossible expense item date as a field error', () => {
      const result = expenseReportSchema.safeParse({
        purpose: 'Trip',
        reimbursementMethod: 'check',
        expenseItems: [{ date: '2024-02-30', vendor: 'Shop', amount: '10.00' }],
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues).toEqual([
          expect.objectContaining({ path: ['expenseItems', 0, 'date'], message: 'Invalid date format' }),
        ]);
      }
    });
  });
});
