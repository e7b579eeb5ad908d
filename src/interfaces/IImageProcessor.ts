/**
 * Image rendition pipeline
 */

export interface ImageRenditions {
  optimized: Buffer;
  thumbnail: Buffer;
  width: number;
  height: number;
  blurHash: string;
  /** Content type shared by both renditions */
  contentType: string;
  /** File extension (with dot) matching contentType */
  extension: string;
}

export interface IImageProcessor {
  process(source: Buffer): Promise<ImageRenditions>;
}
