/**
 * MinIO Object Store
 *
 * S3-compatible object storage via the MinIO client.
 */

import { Client } from 'minio';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';

export interface MinioConfig {
  endPoint: string;
  port: number;
  useSSL: boolean;
  accessKey: string;
  secretKey: string;
}

export interface UploadProgress {
  file: string;
  uploaded: number;
  total: number;
  percentage: number;
}

export interface PutFileRequest {
  bucket: string;
  key: string;
  filePath: string;
  contentType: string;
  metadata?: Record<string, string>;
  onProgress?: (progress: UploadProgress) => void;
}

/**
 * The slice of an object store the publisher needs
 */
export interface ObjectStore {
  bucketExists(bucket: string): Promise<boolean>;
  makeBucket(bucket: string): Promise<void>;
  putFile(request: PutFileRequest): Promise<{ etag: string }>;
}

export class MinioObjectStore implements ObjectStore {
  private client: Client;

  constructor(config: MinioConfig) {
    this.client = new Client({
      endPoint: config.endPoint,
      port: config.port,
      useSSL: config.useSSL,
      accessKey: config.accessKey,
      secretKey: config.secretKey,
    });
  }

  async bucketExists(bucket: string): Promise<boolean> {
    return this.client.bucketExists(bucket);
  }

  async makeBucket(bucket: string): Promise<void> {
    await this.client.makeBucket(bucket);
  }

  /**
   * Stream a local file into the bucket
   */
  async putFile(request: PutFileRequest): Promise<{ etag: string }> {
    const fileStat = await stat(request.filePath);
    const fileSize = fileStat.size;

    const stream = createReadStream(request.filePath);

    let uploaded = 0;
    stream.on('data', (chunk) => {
      uploaded += chunk.length;
      request.onProgress?.({
        file: request.filePath,
        uploaded,
        total: fileSize,
        percentage: fileSize === 0 ? 100 : (uploaded / fileSize) * 100,
      });
    });

    const result = await this.client.putObject(request.bucket, request.key, stream, fileSize, {
      'Content-Type': request.contentType,
      ...request.metadata,
    });

    return { etag: result.etag };
  }
}
