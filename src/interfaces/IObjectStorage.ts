/**
 * Object storage abstraction (one instance per bucket)
 */

export interface PresignedUpload {
  url: string;
  fields: Record<string, string>;
}

export interface PresignUploadParams {
  key: string;
  contentType: string;
  maxSizeBytes: number;
  expiresInSeconds: number;
}

export interface IObjectStorage {
  readonly bucket: string;

  putObject(key: string, body: Buffer, contentType: string): Promise<void>;

  getObject(key: string): Promise<Buffer>;

  deleteObject(key: string): Promise<void>;

  /**
   * Presigned POST for direct browser uploads
   */
  presignUpload(params: PresignUploadParams): Promise<PresignedUpload>;

  /**
   * Public URL of an object (key segments URI-encoded)
   */
  objectUrl(key: string): string;

  /**
   * Inverse of objectUrl; null when the URL is not in this bucket
   */
  keyFromUrl(url: string): string | null;
}
