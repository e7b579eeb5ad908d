/**
 * S3 Object Storage Adapter
 *
 * One instance per bucket. Browser uploads go straight to S3 through
 * presigned POSTs; the API only reads and writes objects for processing.
 * S3_ENDPOINT switches to path-style addressing for S3-compatible stores.
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
} from '@aws-sdk/client-s3';
import { createPresignedPost } from '@aws-sdk/s3-presigned-post';
import { IObjectStorage, PresignUploadParams, PresignedUpload } from '@/interfaces/IObjectStorage';
import { env } from '@/config/env';

export function createS3Client(): S3Client {
  return new S3Client({
    region: env.AWS_REGION,
    ...(env.S3_ENDPOINT ? { endpoint: env.S3_ENDPOINT, forcePathStyle: true } : {}),
  });
}

/**
 * URI-encode each path segment of a key, keeping the slashes
 */
export function encodeKey(key: string): string {
  return key.split('/').map(encodeURIComponent).join('/');
}

export class S3ObjectStorage implements IObjectStorage {
  private readonly baseUrl: string;

  constructor(
    private readonly client: S3Client,
    public readonly bucket: string,
    endpoint: string = env.S3_ENDPOINT,
    region: string = env.AWS_REGION
  ) {
    this.baseUrl = endpoint
      ? `${endpoint.replace(/\/+$/, '')}/${bucket}`
      : `https://${bucket}.s3.${region}.amazonaws.com`;
  }

  async putObject(key: string, body: Buffer, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      })
    );
  }

  async getObject(key: string): Promise<Buffer> {
    const response = await this.client.send(
      new GetObjectCommand({ Bucket: this.bucket, Key: key })
    );

    if (!response.Body) {
      throw new Error(`Object ${key} has no body`);
    }

    return Buffer.from(await response.Body.transformToByteArray());
  }

  async deleteObject(key: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
  }

  async presignUpload(params: PresignUploadParams): Promise<PresignedUpload> {
    const { url, fields } = await createPresignedPost(this.client, {
      Bucket: this.bucket,
      Key: params.key,
      Conditions: [
        ['content-length-range', 0, params.maxSizeBytes],
        ['eq', '$Content-Type', params.contentType],
      ],
      Fields: {
        'Content-Type': params.contentType,
      },
      Expires: params.expiresInSeconds,
    });

    return { url, fields };
  }

  objectUrl(key: string): string {
    return `${this.baseUrl}/${encodeKey(key)}`;
  }

  keyFromUrl(url: string): string | null {
    const prefix = `${this.baseUrl}/`;
    if (!url.startsWith(prefix)) {
      return null;
    }
    try {
      return decodeURIComponent(url.slice(prefix.length));
    } catch {
      return null;
    }
  }
}
