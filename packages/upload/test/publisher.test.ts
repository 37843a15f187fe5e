import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MissingConfigurationError, PublishError } from '@relpack/core';
import { removePath } from '@relpack/utils';
import { ArchivePublisher, createPublisher, objectKey } from '../src/publisher.js';
import type { ObjectStore, PutFileRequest } from '../src/targets/minio.js';

const ARCHIVE_SHA256 = '732d72e2a4bb150232c9885bb63214b769658e30289bd77bf7fd708291d74fad';

class InMemoryObjectStore implements ObjectStore {
  readonly buckets = new Set<string>();
  readonly objects = new Map<string, PutFileRequest>();
  failuresBeforeSuccess = 0;
  putAttempts = 0;

  async bucketExists(bucket: string): Promise<boolean> {
    return this.buckets.has(bucket);
  }

  async makeBucket(bucket: string): Promise<void> {
    this.buckets.add(bucket);
  }

  async putFile(request: PutFileRequest): Promise<{ etag: string }> {
    this.putAttempts++;
    if (this.failuresBeforeSuccess > 0) {
      this.failuresBeforeSuccess--;
      throw new Error('connect ECONNRESET');
    }
    this.objects.set(`${request.bucket}/${request.key}`, request);
    return { etag: `etag-${this.putAttempts}` };
  }
}

describe('objectKey', () => {
  it('joins prefix and archive name', () => {
    expect(objectKey('releases/2.0', 'rhs-hadoop-install-2_0.tar.gz')).toBe(
      'releases/2.0/rhs-hadoop-install-2_0.tar.gz'
    );
  });

  it('ignores surrounding slashes and empty prefixes', () => {
    expect(objectKey('/releases/', 'a.tar.gz')).toBe('releases/a.tar.gz');
    expect(objectKey(undefined, 'a.tar.gz')).toBe('a.tar.gz');
    expect(objectKey('', 'a.tar.gz')).toBe('a.tar.gz');
  });
});

describe('ArchivePublisher', () => {
  let dir: string;
  let archive: string;
  let store: InMemoryObjectStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'relpack-publish-'));
    archive = join(dir, 'rhs-hadoop-install-2_0.tar.gz');
    await writeFile(archive, 'release archive bytes');
    store = new InMemoryObjectStore();
  });

  afterEach(async () => {
    await removePath(dir);
  });

  it('creates the bucket and uploads with checksum metadata', async () => {
    const publisher = new ArchivePublisher(store, { defaultBucket: 'releases' });

    const result = await publisher.publish(archive, { prefix: 'rhs/2.0' });

    expect(result).toEqual({
      bucket: 'releases',
      key: 'rhs/2.0/rhs-hadoop-install-2_0.tar.gz',
      etag: 'etag-1',
      size: 21,
      sha256: ARCHIVE_SHA256,
    });
    expect(store.buckets.has('releases')).toBe(true);
    const stored = store.objects.get('releases/rhs/2.0/rhs-hadoop-install-2_0.tar.gz');
    expect(stored?.contentType).toBe('application/gzip');
    expect(stored?.metadata).toEqual({ 'x-amz-meta-sha256': ARCHIVE_SHA256 });
    expect(stored?.filePath).toBe(archive);
  });

  it('prefers an explicit bucket over the default', async () => {
    const result = await new ArchivePublisher(store, { defaultBucket: 'releases' }).publish(archive, {
      bucket: 'nightly',
    });

    expect(result.bucket).toBe('nightly');
    expect(result.key).toBe('rhs-hadoop-install-2_0.tar.gz');
    expect([...store.buckets]).toEqual(['nightly']);
  });

  it('retries transient upload failures', async () => {
    store.failuresBeforeSuccess = 2;
    const publisher = new ArchivePublisher(store, {
      defaultBucket: 'releases',
      retry: { initialDelay: 1 },
    });

    const result = await publisher.publish(archive);

    expect(store.putAttempts).toBe(3);
    expect(result.etag).toBe('etag-3');
  });

  it('gives up after three attempts', async () => {
    store.failuresBeforeSuccess = 5;
    const publisher = new ArchivePublisher(store, {
      defaultBucket: 'releases',
      retry: { initialDelay: 1 },
    });

    const attempt = publisher.publish(archive);

    await expect(attempt).rejects.toBeInstanceOf(PublishError);
    await expect(attempt).rejects.toThrow(`Publishing ${archive} failed: connect ECONNRESET`);
    expect(store.putAttempts).toBe(3);
  });

  it('rejects a missing archive without touching the store', async () => {
    const publisher = new ArchivePublisher(store, { defaultBucket: 'releases' });

    await expect(publisher.publish(join(dir, 'missing.tar.gz'))).rejects.toThrow('archive not found');
    expect(store.putAttempts).toBe(0);
  });

  it('requires a bucket', async () => {
    await expect(new ArchivePublisher(store).publish(archive)).rejects.toMatchObject({
      code: 'MISSING_CONFIGURATION',
      exitCode: 2,
      details: { configName: 'MINIO_BUCKET' },
    });
  });
});

describe('createPublisher', () => {
  const storage = {
    endPoint: 'localhost',
    port: 9000,
    useSSL: false,
    accessKey: 'test-access',
    secretKey: 'test-secret',
    bucket: 'releases',
  };

  it('builds a MinIO-backed publisher from complete settings', () => {
    expect(createPublisher(storage)).toBeInstanceOf(ArchivePublisher);
  });

  it.each([
    ['endpoint', { ...storage, endPoint: undefined }, 'MINIO_ENDPOINT'],
    ['access key', { ...storage, accessKey: undefined }, 'MINIO_ACCESS_KEY'],
    ['secret key', { ...storage, secretKey: undefined }, 'MINIO_SECRET_KEY'],
  ])('names a missing %s', (_label, incomplete, variable) => {
    expect(() => createPublisher(incomplete)).toThrow(MissingConfigurationError);
    expect(() => createPublisher(incomplete)).toThrow(`Missing required configuration: ${variable}`);
  });
});
