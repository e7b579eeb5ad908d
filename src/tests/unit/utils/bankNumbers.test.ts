import {
  isValidRoutingChecksum,
  routingNumberErrors,
  accountNumberErrors,
  lastFour,
} from '@/utils/bankNumbers';

describe('bank number checks', () => {
  it('should validate the ABA checksum', () => {
    expect(isValidRoutingChecksum('011000015')).toBe(true);
    expect(isValidRoutingChecksum('021000021')).toBe(true);
    expect(isValidRoutingChecksum('011000016')).toBe(false);
    expect(isValidRoutingChecksum('12345')).toBe(false);
  });

  it('should report the length error before the checksum error', () => {
    expect(routingNumberErrors('1234')).toEqual(['must be 9 digits']);
    expect(routingNumberErrors('01100001a')).toEqual(['must be 9 digits']);
    expect(routingNumberErrors('011000016')).toEqual(['is not a valid US routing number']);
    expect(routingNumberErrors('011000015')).toEqual([]);
  });

  it('should check account numbers for digits and length', () => {
    expect(accountNumberErrors('123456789')).toEqual([]);
    expect(accountNumberErrors('12a4')).toEqual(['must contain only digits', 'must be at least 4 digits']);
    expect(accountNumberErrors('123')).toEqual(['must be at least 4 digits']);
  });

  it('should keep the last four digits', () => {
    expect(lastFour('123456789')).toBe('6789');
  });
});
