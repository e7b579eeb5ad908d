import Decimal from 'decimal.js';

/**
 * Money helpers
 *
 * PostgreSQL NUMERIC comes back as a string; all arithmetic goes through
 * Decimal.js and results are stored/returned as 2-decimal strings.
 */

const MONEY_PATTERN = /^-?\d+(\.\d{1,2})?$/;

export type MoneyParseResult =
  | { ok: true; value: Decimal }
  | { ok: false; error: 'invalid amount format' };

/**
 * Parse operator input such as "25", "25.5", "$1,200.00"
 */
export function parseMoney(input: string | number): MoneyParseResult {
  const normalized = String(input).trim().replace(/^\$/, '').replace(/,/g, '');

  if (!MONEY_PATTERN.test(normalized)) {
    return { ok: false, error: 'invalid amount format' };
  }

  return { ok: true, value: new Decimal(normalized) };
}

/**
 * Format a value as a 2-decimal string ("45.00")
 */
export function toMoneyString(value: Decimal.Value): string {
  return new Decimal(value).toFixed(2);
}

/**
 * Sum money strings exactly
 */
export function sumMoney(values: readonly Decimal.Value[]): Decimal {
  return values.reduce<Decimal>((total, value) => total.plus(value), new Decimal(0));
}

/**
 * Negate a money string ("12.50" → "-12.50")
 */
export function negateMoney(value: Decimal.Value): string {
  return new Decimal(value).negated().toFixed(2);
}
