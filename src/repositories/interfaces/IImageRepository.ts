import { Image, UploadData, ProcessedImage } from '@/models';
import { ProcessingState } from '@/constants/media';
import { KeysetCursor } from '@/utils/cursor';

export interface NewImage {
  userId: string;
  rawImagePath: string;
  uploadData: UploadData;
}

/**
 * Image Repository Interface
 */
export interface IImageRepository {
  /**
   * Ordered by inserted_at DESC, id DESC
   */
  listImages(limit: number, offset: number): Promise<Image[]>;

  /**
   * Keyset page after the cursor (first page when null)
   */
  listImagesAfter(cursor: KeysetCursor | null, limit: number): Promise<Image[]>;

  countImages(): Promise<number>;

  createImages(images: readonly NewImage[]): Promise<Image[]>;

  findImageById(imageId: string): Promise<Image | null>;

  updateImageDetails(
    imageId: string,
    details: { title?: string | null; altText?: string | null }
  ): Promise<Image | null>;

  setProcessingState(imageId: string, state: ProcessingState): Promise<void>;

  /**
   * Write renditions and mark the image completed
   */
  markProcessed(imageId: string, processed: ProcessedImage): Promise<Image | null>;

  deleteImage(imageId: string): Promise<boolean>;
}
