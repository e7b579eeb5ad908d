import { extname, basename } from 'path';
import { ulid } from 'ulid';
import { MEDIA_RULES, PAGINATION_LIMITS } from '@/config/businessRules';
import { Image } from '@/models';
import { IMAGE_VERSIONS, ImageVersion } from '@/constants/media';
import { NotFoundError, ValidationError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IObjectStorage, PresignedUpload } from '@/interfaces/IObjectStorage';
import { IJobQueue } from '@/jobs/JobQueue';
import { AppJobs } from '@/jobs/jobs';
import { IImageRepository } from '@/repositories/interfaces';
import { decodeCursor, encodeCursor, KeysetCursor } from '@/utils/cursor';

const logger = createLogger('MediaService');

const UPLOAD_KEY_PREFIX = 'public/';

export interface UploadRequest {
  clientName: string;
  contentType: string;
  size: number;
}

export interface PresignedImageUpload extends PresignedUpload {
  clientName: string;
  key: string;
}

export interface RegisteredUpload extends UploadRequest {
  key: string;
}

/**
 * Keep a client file name safe to embed in an object key
 */
export function sanitizeFileName(name: string): string {
  const cleaned = basename(name.replace(/\\/g, '/'))
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^[._]+/, '');
  return cleaned === '' ? 'upload' : cleaned;
}

/**
 * Problems with one requested upload, in the order they are checked
 */
export function uploadErrors(upload: UploadRequest): string[] {
  const errors: string[] = [];
  const extension = extname(upload.clientName).toLowerCase();

  if (!MEDIA_RULES.ACCEPTED_EXTENSIONS.some((accepted) => accepted === extension)) {
    errors.push('You have selected an unacceptable file type');
  }
  if (upload.size > MEDIA_RULES.MAX_FILE_SIZE_BYTES) {
    errors.push('Too large');
  }

  return errors;
}

function renditionUrl(image: Image, version: ImageVersion): string {
  switch (version) {
    case IMAGE_VERSIONS.OPTIMIZED:
      return image.optimizedImagePath ?? image.rawImagePath;
    case IMAGE_VERSIONS.THUMBNAIL:
      return image.thumbnailPath ?? image.rawImagePath;
    case IMAGE_VERSIONS.RAW:
      return image.rawImagePath;
  }
}

function isImageVersion(value: string): value is ImageVersion {
  return Object.values(IMAGE_VERSIONS).some((version) => version === value);
}

/**
 * Media Service
 * Gallery listing, direct-to-S3 uploads and image metadata
 */
export class MediaService {
  constructor(
    private imageRepo: IImageRepository,
    private storage: IObjectStorage,
    private jobQueue: IJobQueue<AppJobs>
  ) {}

  /**
   * Page-numbered listing; a page below 1 resets to the first page
   */
  async listImages(params: { page: number; perPage?: number }): Promise<{
    images: Image[];
    page: number;
    perPage: number;
    endOfTimeline: boolean;
  }> {
    const page = params.page < 1 ? 1 : params.page;
    const perPage = Math.min(
      params.perPage ?? PAGINATION_LIMITS.MEDIA_PAGE_SIZE,
      PAGINATION_LIMITS.MAX_MEDIA_PAGE_SIZE
    );

    const images = await this.imageRepo.listImages(perPage, (page - 1) * perPage);

    return { images, page, perPage, endOfTimeline: images.length < perPage };
  }

  /**
   * Infinite-scroll feed keyed on (inserted_at, id)
   */
  async feedImages(params: { cursor?: string; limit?: number }): Promise<{
    images: Image[];
    nextCursor: string | null;
    hasMore: boolean;
  }> {
    const limit = Math.min(
      params.limit ?? PAGINATION_LIMITS.MEDIA_PAGE_SIZE,
      PAGINATION_LIMITS.MAX_MEDIA_PAGE_SIZE
    );

    let cursor: KeysetCursor | null = null;
    if (params.cursor) {
      cursor = decodeCursor(params.cursor);
      if (!cursor) {
        throw new ValidationError('Invalid cursor');
      }
    }

    const rows = await this.imageRepo.listImagesAfter(cursor, limit + 1);
    const hasMore = rows.length > limit;
    const images = rows.slice(0, limit);
    const last = images[images.length - 1];

    return {
      images,
      hasMore,
      nextCursor: hasMore && last ? encodeCursor(last) : null,
    };
  }

  async countImages(): Promise<number> {
    return this.imageRepo.countImages();
  }

  /**
   * Presigned POSTs for browser uploads straight to the media bucket
   */
  async presignUploads(uploads: UploadRequest[]): Promise<PresignedImageUpload[]> {
    if (uploads.length > MEDIA_RULES.MAX_UPLOAD_ENTRIES) {
      throw new ValidationError('Too many files');
    }

    const problems = uploads
      .map((upload) => ({ clientName: upload.clientName, errors: uploadErrors(upload) }))
      .filter((problem) => problem.errors.length > 0);

    const first = problems[0]?.errors[0];
    if (first) {
      throw new ValidationError(first, { files: problems });
    }

    return Promise.all(
      uploads.map(async (upload) => {
        const key = `${UPLOAD_KEY_PREFIX}${ulid()}_${sanitizeFileName(upload.clientName)}`;
        const presigned = await this.storage.presignUpload({
          key,
          contentType: upload.contentType,
          maxSizeBytes: MEDIA_RULES.MAX_FILE_SIZE_BYTES,
          expiresInSeconds: MEDIA_RULES.PRESIGN_EXPIRY_SECONDS,
        });
        return { clientName: upload.clientName, key, ...presigned };
      })
    );
  }

  /**
   * Record finished uploads and queue their processing
   */
  async registerUploads(userId: string, uploads: RegisteredUpload[]): Promise<Image[]> {
    const invalidKey = uploads.find(
      (upload) => !upload.key.startsWith(UPLOAD_KEY_PREFIX) || upload.key.includes('..')
    );
    if (invalidKey) {
      throw new ValidationError('Invalid upload key', { key: invalidKey.key });
    }

    const images = await this.imageRepo.createImages(
      uploads.map((upload) => ({
        userId,
        rawImagePath: this.storage.objectUrl(upload.key),
        uploadData: {
          key: upload.key,
          clientName: upload.clientName,
          contentType: upload.contentType,
          size: upload.size,
        },
      }))
    );

    for (const image of images) {
      this.jobQueue.enqueue(
        'image_processing',
        { imageId: image.id },
        { maxAttempts: MEDIA_RULES.PROCESSING_MAX_ATTEMPTS }
      );
    }

    logger.info({ userId, count: images.length }, 'Uploads registered');
    return images;
  }

  /**
   * Image with the URL of the requested rendition
   * Unknown versions fall back to the thumbnail, missing renditions to the raw upload.
   */
  async getImage(
    imageId: string,
    version?: string
  ): Promise<{ image: Image; version: ImageVersion; url: string }> {
    const image = await this.findImage(imageId);
    const resolved: ImageVersion =
      version && isImageVersion(version) ? version : IMAGE_VERSIONS.THUMBNAIL;

    return { image, version: resolved, url: renditionUrl(image, resolved) };
  }

  async updateImage(
    imageId: string,
    details: { title?: string | null; altText?: string | null }
  ): Promise<Image> {
    const image = await this.imageRepo.updateImageDetails(imageId, details);
    if (!image) {
      throw new NotFoundError('Image not found');
    }
    return image;
  }

  /**
   * Delete the row and, best effort, the objects it points to
   */
  async deleteImage(imageId: string): Promise<{ message: string }> {
    const image = await this.findImage(imageId);

    const keys = [image.rawImagePath, image.optimizedImagePath, image.thumbnailPath]
      .map((path) => (path ? this.storage.keyFromUrl(path) : null))
      .filter((key): key is string => key !== null);

    for (const key of keys) {
      try {
        await this.storage.deleteObject(key);
      } catch (error) {
        logger.warn({ error, imageId, key }, 'Failed to delete image object');
      }
    }

    await this.imageRepo.deleteImage(imageId);
    logger.info({ imageId, objects: keys.length }, 'Image deleted');

    return { message: 'Image deleted' };
  }

  private async findImage(imageId: string): Promise<Image> {
    const image = await this.imageRepo.findImageById(imageId);
    if (!image) {
      throw new NotFoundError('Image not found');
    }
    return image;
  }
}
