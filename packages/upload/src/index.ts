/**
 * @relpack/upload
 *
 * Publishes release archives to S3-compatible object storage (MinIO).
 */

export {
  MinioObjectStore,
  type MinioConfig,
  type ObjectStore,
  type PutFileRequest,
  type UploadProgress,
} from './targets/minio.js';

export {
  ArchivePublisher,
  ARCHIVE_CONTENT_TYPE,
  createPublisher,
  objectKey,
  type ArchivePublisherOptions,
  type PublishOptions,
  type PublishResult,
} from './publisher.js';
