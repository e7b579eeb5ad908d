import { formatPersonName } from '@/utils/names';

describe('formatPersonName', () => {
  it('should capitalize each part', () => {
    expect(formatPersonName('aSTRID', 'LINDGREN')).toBe('Astrid Lindgren');
  });

  it('should skip missing or blank parts', () => {
    expect(formatPersonName(null, 'lindgren')).toBe('Lindgren');
    expect(formatPersonName('  ', null)).toBe('');
  });
});
