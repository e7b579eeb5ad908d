import { encodeCursor, decodeCursor } from '@/utils/cursor';

describe('keyset cursor', () => {
  it('should encode timestamp and id', () => {
    const cursor = { insertedAt: new Date('2024-03-01T12:00:00.000Z'), id: '01HIMG00000000000000000001' };

    expect(encodeCursor(cursor)).toBe('2024-03-01T12:00:00.000Z_01HIMG00000000000000000001');
    expect(decodeCursor(encodeCursor(cursor))).toEqual(cursor);
  });

  it('should reject cursors without both parts', () => {
    expect(decodeCursor('no-separator')).toBeNull();
    expect(decodeCursor('_01HIMG00000000000000000001')).toBeNull();
    expect(decodeCursor('2024-03-01T12:00:00.000Z_')).toBeNull();
    expect(decodeCursor('yesterday_01HIMG00000000000000000001')).toBeNull();
  });
});
