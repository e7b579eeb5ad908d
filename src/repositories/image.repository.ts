import { ulid } from 'ulid';
import { query } from '@/config/database';
import { Image, ProcessedImage } from '@/models';
import { PROCESSING_STATES, ProcessingState } from '@/constants/media';
import { KeysetCursor } from '@/utils/cursor';
import { IImageRepository, NewImage } from './interfaces/IImageRepository';

const IMAGE_COLUMNS = `
  id,
  title,
  alt_text AS "altText",
  user_id AS "userId",
  raw_image_path AS "rawImagePath",
  optimized_image_path AS "optimizedImagePath",
  thumbnail_path AS "thumbnailPath",
  blur_hash AS "blurHash",
  width,
  height,
  processing_state AS "processingState",
  upload_data AS "uploadData",
  inserted_at AS "insertedAt"
`;

/**
 * Image Repository
 * Handles all database operations for gallery images
 */
export class ImageRepository implements IImageRepository {
  async listImages(limit: number, offset: number): Promise<Image[]> {
    const result = await query<Image>(
      `
      SELECT ${IMAGE_COLUMNS}
      FROM images
      ORDER BY inserted_at DESC, id DESC
      LIMIT $1 OFFSET $2
      `,
      [limit, offset]
    );

    return result.rows;
  }

  /**
   * Keyset pagination: rows strictly older than the cursor row.
   * While the cursor row exists its stored timestamp is the bound, so a
   * cursor rounded to milliseconds never skips rows within the same millisecond.
   */
  async listImagesAfter(cursor: KeysetCursor | null, limit: number): Promise<Image[]> {
    if (!cursor) {
      return this.listImages(limit, 0);
    }

    const result = await query<Image>(
      `
      SELECT ${IMAGE_COLUMNS}
      FROM images
      WHERE (inserted_at, id) < (
        COALESCE((SELECT inserted_at FROM images WHERE id = $2), $1::timestamptz),
        $2
      )
      ORDER BY inserted_at DESC, id DESC
      LIMIT $3
      `,
      [cursor.insertedAt, cursor.id, limit]
    );

    return result.rows;
  }

  async countImages(): Promise<number> {
    const result = await query<{ count: number }>('SELECT COUNT(*)::int AS count FROM images');
    return result.rows[0]?.count ?? 0;
  }

  async createImages(images: readonly NewImage[]): Promise<Image[]> {
    const created: Image[] = [];

    for (const image of images) {
      const result = await query<Image>(
        `
        INSERT INTO images (id, user_id, raw_image_path, processing_state, upload_data, inserted_at)
        VALUES ($1, $2, $3, $4, $5, NOW())
        RETURNING ${IMAGE_COLUMNS}
        `,
        [
          ulid(),
          image.userId,
          image.rawImagePath,
          PROCESSING_STATES.UNPROCESSED,
          JSON.stringify(image.uploadData),
        ]
      );

      const row = result.rows[0];
      if (!row) {
        throw new Error('Failed to insert image');
      }
      created.push(row);
    }

    return created;
  }

  async findImageById(imageId: string): Promise<Image | null> {
    const result = await query<Image>(`SELECT ${IMAGE_COLUMNS} FROM images WHERE id = $1`, [
      imageId,
    ]);

    return result.rows[0] ?? null;
  }

  async updateImageDetails(
    imageId: string,
    details: { title?: string | null; altText?: string | null }
  ): Promise<Image | null> {
    const result = await query<Image>(
      `
      UPDATE images
      SET title = CASE WHEN $2 THEN $3 ELSE title END,
          alt_text = CASE WHEN $4 THEN $5 ELSE alt_text END
      WHERE id = $1
      RETURNING ${IMAGE_COLUMNS}
      `,
      [
        imageId,
        details.title !== undefined,
        details.title ?? null,
        details.altText !== undefined,
        details.altText ?? null,
      ]
    );

    return result.rows[0] ?? null;
  }

  async setProcessingState(imageId: string, state: ProcessingState): Promise<void> {
    await query('UPDATE images SET processing_state = $2 WHERE id = $1', [imageId, state]);
  }

  async markProcessed(imageId: string, processed: ProcessedImage): Promise<Image | null> {
    const result = await query<Image>(
      `
      UPDATE images
      SET optimized_image_path = $2,
          thumbnail_path = $3,
          blur_hash = $4,
          width = $5,
          height = $6,
          processing_state = $7
      WHERE id = $1
      RETURNING ${IMAGE_COLUMNS}
      `,
      [
        imageId,
        processed.optimizedImagePath,
        processed.thumbnailPath,
        processed.blurHash,
        processed.width,
        processed.height,
        PROCESSING_STATES.COMPLETED,
      ]
    );

    return result.rows[0] ?? null;
  }

  async deleteImage(imageId: string): Promise<boolean> {
    const result = await query('DELETE FROM images WHERE id = $1', [imageId]);
    return (result.rowCount ?? 0) > 0;
  }
}
