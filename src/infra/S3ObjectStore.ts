import { Readable } from 'node:stream';
import {
  S3Client,
  S3ServiceException,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  PutObjectCommand,
} from '@aws-sdk/client-s3';
import { NotFoundError, UnavailableError } from '../domain/errors.js';
import type { Env } from './env.js';
import { logger } from './logger.js';
import { isNetworkError, withRetry } from './retry.js';
import { joinKey, type ObjectStore, type StoredObject } from './ObjectStore.js';

type S3ObjectStoreOptions = {
  bucket: string;
  prefix: string;
  retryAttempts: number;
  retryBaseDelayMs?: number;
};

/**
 * One client per process; OSS speaks the S3 protocol with virtual-hosted bucket addressing.
 */
export function createS3Client(env: Env): S3Client {
  return new S3Client({
    region: env.ALIYUN_OSS_REGION,
    endpoint: env.ALIYUN_OSS_ENDPOINT,
    forcePathStyle: false,
    credentials: {
      accessKeyId: env.ALIYUN_OSS_ACCESS_KEY,
      secretAccessKey: env.ALIYUN_OSS_SECRET_KEY,
    },
    // Retries happen in withRetry
    maxAttempts: 1,
    requestChecksumCalculation: 'WHEN_REQUIRED',
    responseChecksumValidation: 'WHEN_REQUIRED',
  });
}

function isMissingObject(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) return false;
  return (
    error.name === 'NoSuchKey' ||
    error.name === 'NotFound' ||
    error.$metadata.httpStatusCode === 404
  );
}

export function isTransientS3Error(error: unknown): boolean {
  if (error instanceof S3ServiceException) {
    if (error.$retryable) return true;
    const status = error.$metadata.httpStatusCode ?? 0;
    return status >= 500 || status === 429;
  }
  return isNetworkError(error);
}

export class S3ObjectStore implements ObjectStore {
  private readonly bucket: string;
  private readonly prefix: string;
  private readonly retryAttempts: number;
  private readonly retryBaseDelayMs: number;

  constructor(
    private client: S3Client,
    options: S3ObjectStoreOptions
  ) {
    this.bucket = options.bucket;
    this.prefix = options.prefix;
    this.retryAttempts = options.retryAttempts;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 200;
  }

  static fromEnv(env: Env, client: S3Client = createS3Client(env)): S3ObjectStore {
    return new S3ObjectStore(client, {
      bucket: env.ALIYUN_OSS_BUCKET_NAME,
      prefix: env.ALIYUN_OSS_PATH,
      retryAttempts: env.STORE_RETRY_ATTEMPTS,
    });
  }

  async put(key: string, body: Buffer, contentType: string): Promise<StoredObject> {
    await this.run('put', key, () =>
      this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: this.fullKey(key),
          Body: body,
          ContentType: contentType,
          ContentLength: body.byteLength,
        })
      )
    );
    logger.debug('Object stored', { key, sizeBytes: body.byteLength });
    return { key, sizeBytes: body.byteLength };
  }

  async get(key: string): Promise<Buffer> {
    const res = await this.run('get', key, () =>
      this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key) }))
    );
    if (!res.Body) {
      throw new NotFoundError('Object', key);
    }
    const bytes = await res.Body.transformToByteArray();
    return Buffer.from(bytes);
  }

  async stream(key: string): Promise<Readable> {
    const res = await this.run('stream', key, () =>
      this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key) }))
    );
    if (res.Body instanceof Readable) {
      return res.Body;
    }
    if (!res.Body) {
      throw new NotFoundError('Object', key);
    }
    const bytes = await res.Body.transformToByteArray();
    return Readable.from(Buffer.from(bytes));
  }

  async head(key: string): Promise<StoredObject> {
    const res = await this.run('head', key, () =>
      this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key) }))
    );
    return { key, sizeBytes: res.ContentLength ?? 0 };
  }

  async delete(key: string): Promise<void> {
    await this.run('delete', key, () =>
      this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key) }))
    );
  }

  async ping(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch (error) {
      throw new UnavailableError('object-store', 'Object store did not answer', {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private fullKey(key: string): string {
    return joinKey(this.prefix, key);
  }

  private async run<T>(operation: string, key: string, fn: () => Promise<T>): Promise<T> {
    const label = `${operation} ${key}`;
    try {
      return await withRetry(fn, {
        attempts: this.retryAttempts,
        baseDelayMs: this.retryBaseDelayMs,
        isTransient: isTransientS3Error,
        label: `object-store ${label}`,
        onExhausted: (error) =>
          new UnavailableError('object-store', `Object store unavailable during ${label}`, {
            cause: error instanceof Error ? error.message : String(error),
          }),
      });
    } catch (error) {
      if (isMissingObject(error)) {
        throw new NotFoundError('Object', key);
      }
      throw error;
    }
  }
}
