import { posix } from 'path';
import { PROCESSING_STATES } from '@/constants/media';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import { IObjectStorage } from '@/interfaces/IObjectStorage';
import { IImageProcessor } from '@/interfaces/IImageProcessor';
import { Job } from '@/jobs/JobQueue';
import { ImageProcessingJob } from '@/jobs/jobs';
import { IImageRepository } from '@/repositories/interfaces';

const logger = createLogger('ImageProcessingService');

export const OPTIMIZED_PREFIX = 'public/optimized/';
export const THUMBNAIL_PREFIX = 'public/thumbnails/';

/**
 * Key of a rendition: same file stem as the upload, new prefix and extension
 */
export function renditionKey(rawKey: string, prefix: string, extension: string): string {
  const { name } = posix.parse(rawKey);
  return `${prefix}${name}${extension}`;
}

/**
 * Image Processing Service
 * Handler of image_processing jobs
 */
export class ImageProcessingService {
  constructor(
    private imageRepo: IImageRepository,
    private storage: IObjectStorage,
    private processor: IImageProcessor
  ) {}

  async processImage(job: Job<ImageProcessingJob>): Promise<void> {
    const { imageId } = job.data;
    const image = await this.imageRepo.findImageById(imageId);

    if (!image) {
      logger.warn({ imageId, jobId: job.id }, 'Image vanished before processing');
      return;
    }

    await this.imageRepo.setProcessingState(imageId, PROCESSING_STATES.PROCESSING);
    const stopTimer = metrics.startTimer('image.processing_time');

    try {
      const rawKey = this.storage.keyFromUrl(image.rawImagePath);
      if (!rawKey) {
        throw new Error(`Raw image path is outside bucket ${this.storage.bucket}`);
      }

      const source = await this.storage.getObject(rawKey);
      const renditions = await this.processor.process(source);

      const optimizedKey = renditionKey(rawKey, OPTIMIZED_PREFIX, renditions.extension);
      const thumbnailKey = renditionKey(rawKey, THUMBNAIL_PREFIX, renditions.extension);

      await this.storage.putObject(optimizedKey, renditions.optimized, renditions.contentType);
      await this.storage.putObject(thumbnailKey, renditions.thumbnail, renditions.contentType);

      await this.imageRepo.markProcessed(imageId, {
        optimizedImagePath: this.storage.objectUrl(optimizedKey),
        thumbnailPath: this.storage.objectUrl(thumbnailKey),
        blurHash: renditions.blurHash,
        width: renditions.width,
        height: renditions.height,
      });

      logger.info(
        { imageId, jobId: job.id, width: renditions.width, height: renditions.height },
        'Image processed'
      );
      stopTimer();
      metrics.incrementCounter('images.processed');
    } catch (error) {
      await this.imageRepo.setProcessingState(imageId, PROCESSING_STATES.FAILED);
      logger.error({ error, imageId, jobId: job.id, attempt: job.attempts }, 'Image processing failed');
      metrics.incrementCounter('images.failed');
      throw error;
    }
  }
}
