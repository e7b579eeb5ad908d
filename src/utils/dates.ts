const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a calendar date ("2024-05-31") as UTC midnight.
 * Returns null for anything malformed or impossible (2024-02-30).
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value.trim());
  if (!match) return null;

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));

  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    return null;
  }

  return date;
}

/**
 * "YYYY-MM-DD" of a date in UTC
 */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * First instant of the day after `date` (exclusive upper bound of a day range)
 */
export function startOfNextDay(date: Date): Date {
  const next = new Date(date.getTime());
  next.setUTCHours(0, 0, 0, 0);
  next.setUTCDate(next.getUTCDate() + 1);
  return next;
}

export function daysAgo(days: number, from: Date = new Date()): Date {
  const date = new Date(from.getTime());
  date.setUTCHours(0, 0, 0, 0);
  date.setUTCDate(date.getUTCDate() - days);
  return date;
}
