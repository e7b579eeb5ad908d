/**
 * US bank number checks
 */

const ABA_WEIGHTS = [3, 7, 1, 3, 7, 1, 3, 7, 1] as const;

/**
 * ABA routing number checksum: digits weighted 3,7,1 repeating must sum to a
 * multiple of 10. Expects exactly nine digits.
 */
export function isValidRoutingChecksum(routingNumber: string): boolean {
  if (!/^\d{9}$/.test(routingNumber)) {
    return false;
  }

  let sum = 0;
  ABA_WEIGHTS.forEach((weight, index) => {
    sum += weight * Number(routingNumber.charAt(index));
  });

  return sum % 10 === 0;
}

export function lastFour(accountNumber: string): string {
  return accountNumber.slice(-4);
}

/**
 * Field errors for a routing number, in the order they are checked
 */
export function routingNumberErrors(routingNumber: string): string[] {
  if (!/^\d{9}$/.test(routingNumber)) {
    return ['must be 9 digits'];
  }
  if (!isValidRoutingChecksum(routingNumber)) {
    return ['is not a valid US routing number'];
  }
  return [];
}

/**
 * Field errors for an account number
 */
export function accountNumberErrors(accountNumber: string): string[] {
  const errors: string[] = [];
  if (!/^\d*$/.test(accountNumber)) {
    errors.push('must contain only digits');
  }
  if (accountNumber.replace(/\D/g, '').length < 4) {
    errors.push('must be at least 4 digits');
  }
  return errors;
}
