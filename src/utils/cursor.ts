/**
 * Keyset cursor for listings ordered by (inserted_at DESC, id DESC).
 * Encoded as "<ISO timestamp>_<id>"; ids are ULIDs and never contain "_".
 */
export interface KeysetCursor {
  insertedAt: Date;
  id: string;
}

export function encodeCursor(cursor: KeysetCursor): string {
  return `${cursor.insertedAt.toISOString()}_${cursor.id}`;
}

export function decodeCursor(value: string): KeysetCursor | null {
  const separator = value.lastIndexOf('_');
  if (separator <= 0) return null;

  const insertedAt = new Date(value.slice(0, separator));
  const id = value.slice(separator + 1);

  if (Number.isNaN(insertedAt.getTime()) || id === '') {
    return null;
  }

  return { insertedAt, id };
}
