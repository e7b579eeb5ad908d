import { ProcessingState } from '@/constants/media';

/**
 * Metadata captured when a browser upload is registered
 */
export interface UploadData {
  key: string;
  clientName: string;
  contentType: string;
  size: number;
}

/**
 * Image model
 * Matches the 'images' table
 */
export interface Image {
  id: string;
  title: string | null;
  altText: string | null;
  userId: string;
  rawImagePath: string;
  optimizedImagePath: string | null;
  thumbnailPath: string | null;
  blurHash: string | null;
  width: number | null;
  height: number | null;
  processingState: ProcessingState;
  uploadData: UploadData | null;
  insertedAt: Date;
}

/**
 * Result of image processing, written back in one update
 */
export interface ProcessedImage {
  optimizedImagePath: string;
  thumbnailPath: string;
  blurHash: string;
  width: number;
  height: number;
}
