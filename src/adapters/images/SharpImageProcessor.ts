import sharp from 'sharp';
import { encode } from 'blurhash';
import { IImageProcessor, ImageRenditions } from '@/interfaces/IImageProcessor';
import { MEDIA_RULES } from '@/config/businessRules';

/**
 * Image renditions with sharp
 *
 * - Auto-orients from EXIF, then drops all metadata (sharp's default output)
 * - Optimized: WebP, at most OPTIMIZED_MAX_WIDTH wide
 * - Thumbnail: WebP, exactly THUMBNAIL_WIDTH wide (small images are scaled up)
 * - Blurhash computed from a small RGBA rendering
 */
export class SharpImageProcessor implements IImageProcessor {
  async process(source: Buffer): Promise<ImageRenditions> {
    const oriented = sharp(source).rotate();
    const metadata = await oriented.metadata();

    if (!metadata.width || !metadata.height) {
      throw new Error('Unable to read image dimensions');
    }

    // rotate() swaps dimensions for EXIF orientations 5-8
    const swapsAxes = (metadata.orientation ?? 1) >= 5;
    const width = swapsAxes ? metadata.height : metadata.width;
    const height = swapsAxes ? metadata.width : metadata.height;

    const optimized = await sharp(source)
      .rotate()
      .resize({ width: MEDIA_RULES.OPTIMIZED_MAX_WIDTH, withoutEnlargement: true })
      .webp({ quality: MEDIA_RULES.OPTIMIZED_QUALITY })
      .toBuffer();

    const thumbnail = await sharp(source)
      .rotate()
      .resize({ width: MEDIA_RULES.THUMBNAIL_WIDTH })
      .webp({ quality: MEDIA_RULES.OPTIMIZED_QUALITY })
      .toBuffer();

    const { data, info } = await sharp(source)
      .rotate()
      .resize({ width: MEDIA_RULES.BLURHASH_SAMPLE_WIDTH })
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    const blurHash = encode(
      new Uint8ClampedArray(data),
      info.width,
      info.height,
      MEDIA_RULES.BLURHASH_COMPONENTS_X,
      MEDIA_RULES.BLURHASH_COMPONENTS_Y
    );

    return {
      optimized,
      thumbnail,
      width,
      height,
      blurHash,
      contentType: 'image/webp',
      extension: '.webp',
    };
  }
}
