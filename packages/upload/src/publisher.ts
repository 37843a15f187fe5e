/**
 * Archive Publisher
 *
 * Pushes a finished release archive into object storage. The bucket is
 * created on first use and the archive's SHA-256 travels as object metadata.
 */

import { basename, resolve } from 'node:path';
import {
  MissingConfigurationError,
  PublishError,
  RelpackError,
  type RelpackSettings,
} from '@relpack/core';
import {
  calculateFileHash,
  createLogger,
  getFileSizeBytes,
  pathExists,
  retry,
  type RetryOptions,
} from '@relpack/utils';
import { MinioObjectStore, type ObjectStore, type UploadProgress } from './targets/minio.js';

const logger = createLogger({ component: 'upload:publisher' });

export const ARCHIVE_CONTENT_TYPE = 'application/gzip';

export interface PublishOptions {
  bucket?: string;
  /** Key prefix; leading and trailing slashes are ignored */
  prefix?: string;
  onProgress?: (progress: UploadProgress) => void;
}

export interface PublishResult {
  bucket: string;
  key: string;
  etag: string;
  size: number;
  sha256: string;
}

export interface ArchivePublisherOptions {
  defaultBucket?: string;
  retry?: Partial<RetryOptions>;
}

/**
 * Object key for an archive: `<prefix>/<archive-name>`, or the bare name
 */
export function objectKey(prefix: string | undefined, archiveName: string): string {
  const cleaned = (prefix ?? '').replace(/^\/+|\/+$/g, '');
  return cleaned ? `${cleaned}/${archiveName}` : archiveName;
}

export class ArchivePublisher {
  private readonly defaultBucket?: string;
  private readonly retryOptions: Partial<RetryOptions>;

  constructor(
    private readonly store: ObjectStore,
    options: ArchivePublisherOptions = {}
  ) {
    this.defaultBucket = options.defaultBucket;
    this.retryOptions = options.retry ?? {};
  }

  async publish(archivePath: string, options: PublishOptions = {}): Promise<PublishResult> {
    const filePath = resolve(archivePath);
    const bucket = options.bucket ?? this.defaultBucket;
    if (!bucket) {
      throw new MissingConfigurationError('MINIO_BUCKET');
    }
    if (!(await pathExists(filePath))) {
      throw new PublishError(archivePath, 'archive not found');
    }

    const key = objectKey(options.prefix, basename(filePath));
    const [size, sha256] = await Promise.all([
      getFileSizeBytes(filePath),
      calculateFileHash(filePath, 'sha256'),
    ]);

    logger.info({ bucket, key, size }, 'Publishing archive');

    try {
      const { etag } = await retry(
        async () => {
          if (!(await this.store.bucketExists(bucket))) {
            logger.info({ bucket }, 'Creating bucket');
            await this.store.makeBucket(bucket);
          }
          return this.store.putFile({
            bucket,
            key,
            filePath,
            contentType: ARCHIVE_CONTENT_TYPE,
            metadata: { 'x-amz-meta-sha256': sha256 },
            onProgress: options.onProgress,
          });
        },
        {
          maxAttempts: 3,
          ...this.retryOptions,
          onRetry: (error, attempt) => {
            logger.warn(
              { bucket, key, attempt, error: error instanceof Error ? error.message : String(error) },
              'Upload failed, retrying'
            );
          },
        }
      );

      logger.info({ bucket, key, etag }, 'Archive published');
      return { bucket, key, etag, size, sha256 };
    } catch (error) {
      if (error instanceof RelpackError) {
        throw error;
      }
      throw new PublishError(archivePath, error instanceof Error ? error.message : String(error));
    }
  }
}

/**
 * Build a publisher backed by MinIO from the environment settings
 */
export function createPublisher(storage: RelpackSettings['storage']): ArchivePublisher {
  const { endPoint, accessKey, secretKey } = storage;
  if (!endPoint) {
    throw new MissingConfigurationError('MINIO_ENDPOINT');
  }
  if (!accessKey) {
    throw new MissingConfigurationError('MINIO_ACCESS_KEY');
  }
  if (!secretKey) {
    throw new MissingConfigurationError('MINIO_SECRET_KEY');
  }

  const store = new MinioObjectStore({
    endPoint,
    port: storage.port,
    useSSL: storage.useSSL,
    accessKey,
    secretKey,
  });
  return new ArchivePublisher(store, { defaultBucket: storage.bucket });
}
