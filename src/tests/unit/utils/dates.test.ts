import { parseIsoDate, formatIsoDate, startOfNextDay, daysAgo } from '@/utils/dates';

describe('date helpers', () => {
  it('should parse calendar dates as UTC midnight', () => {
    expect(parseIsoDate('2024-02-29')?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
    expect(parseIsoDate(' 2024-05-31 ')?.toISOString()).toBe('2024-05-31T00:00:00.000Z');
  });

  it('should reject impossible or malformed dates', () => {
    expect(parseIsoDate('2023-02-29')).toBeNull();
    expect(parseIsoDate('2024-13-01')).toBeNull();
    expect(parseIsoDate('31/05/2024')).toBeNull();
  });

  it('should format in UTC', () => {
    expect(formatIsoDate(new Date('2024-05-31T23:59:59.000Z'))).toBe('2024-05-31');
  });

  it('should compute the exclusive end of a day', () => {
    expect(startOfNextDay(new Date('2024-05-31T15:30:00.000Z')).toISOString()).toBe(
      '2024-06-01T00:00:00.000Z'
    );
  });

  it('should count days back from midnight', () => {
    expect(daysAgo(30, new Date('2024-03-31T10:00:00.000Z')).toISOString()).toBe(
      '2024-03-01T00:00:00.000Z'
    );
  });
});
