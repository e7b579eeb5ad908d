/**
 * Image processing states
 */
export const PROCESSING_STATES = {
  UNPROCESSED: 'unprocessed',
  PROCESSING: 'processing',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

/**
 * Renditions an image can be served in
 */
export const IMAGE_VERSIONS = {
  OPTIMIZED: 'optimized',
  THUMBNAIL: 'thumbnail',
  RAW: 'raw',
} as const;

export type ProcessingState = (typeof PROCESSING_STATES)[keyof typeof PROCESSING_STATES];
export type ImageVersion = (typeof IMAGE_VERSIONS)[keyof typeof IMAGE_VERSIONS];
