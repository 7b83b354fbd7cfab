import { Readable } from 'node:stream';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  PutObjectCommand,
  S3ServiceException,
  type S3Client,
} from '@aws-sdk/client-s3';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

import { NotFoundError, UnavailableError } from '../../../src/domain/errors.js';
import { joinKey } from '../../../src/infra/ObjectStore.js';
import { S3ObjectStore, isTransientS3Error } from '../../../src/infra/S3ObjectStore.js';

const send = vi.fn();
const client = { send } as unknown as S3Client;

function serviceError(name: string, httpStatusCode: number): S3ServiceException {
  return new S3ServiceException({
    name,
    $fault: httpStatusCode >= 500 ? 'server' : 'client',
    $metadata: { httpStatusCode },
    message: name,
  });
}

function body(text: string) {
  return { transformToByteArray: async () => new TextEncoder().encode(text) };
}

describe('S3ObjectStore', () => {
  let store: S3ObjectStore;

  beforeEach(() => {
    vi.clearAllMocks();
    store = new S3ObjectStore(client, {
      bucket: 'test-bucket',
      prefix: 'books',
      retryAttempts: 3,
      retryBaseDelayMs: 1,
    });
  });

  it('joins keys without doubled slashes', () => {
    expect(joinKey('/books/', 'inputs/a.md')).toBe('books/inputs/a.md');
    expect(joinKey('', 'inputs/a.md')).toBe('inputs/a.md');
  });

  it('puts under the configured prefix', async () => {
    send.mockResolvedValue({});

    const stored = await store.put('inputs/job-1/a.md', Buffer.from('# A\n'), 'text/markdown');

    expect(stored).toEqual({ key: 'inputs/job-1/a.md', sizeBytes: 4 });
    const command: unknown = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PutObjectCommand);
    if (command instanceof PutObjectCommand) {
      expect(command.input).toMatchObject({
        Bucket: 'test-bucket',
        Key: 'books/inputs/job-1/a.md',
        ContentType: 'text/markdown',
        ContentLength: 4,
      });
    }
  });

  it('reads an object into a buffer', async () => {
    send.mockResolvedValue({ Body: body('# A\n') });

    const bytes = await store.get('work/job-1/01-ingest.txt');

    expect(bytes.toString('utf-8')).toBe('# A\n');
    const command: unknown = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(GetObjectCommand);
  });

  it('returns a node stream body as is', async () => {
    const readable = Readable.from([Buffer.from('book')]);
    send.mockResolvedValue({ Body: readable });

    await expect(store.stream('published/job-1/book.md')).resolves.toBe(readable);
  });

  it('maps a missing object to NotFound', async () => {
    send.mockRejectedValue(serviceError('NoSuchKey', 404));

    await expect(store.get('inputs/missing.md')).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.head('inputs/missing.md')).rejects.toThrow(
      'Object with id inputs/missing.md not found'
    );
    expect(send).toHaveBeenCalledTimes(2);
  });

  it('retries server errors and then reports the store unavailable', async () => {
    send.mockRejectedValue(serviceError('InternalError', 500));

    await expect(store.delete('work/job-1/01-ingest.txt')).rejects.toBeInstanceOf(
      UnavailableError
    );
    expect(send).toHaveBeenCalledTimes(3);
    const command: unknown = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(DeleteObjectCommand);
  });

  it('does not retry access errors', async () => {
    const denied = serviceError('AccessDenied', 403);
    send.mockRejectedValue(denied);

    await expect(store.put('a', Buffer.from('x'), 'text/plain')).rejects.toBe(denied);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('pings the bucket', async () => {
    send.mockResolvedValueOnce({}).mockRejectedValueOnce(new Error('socket hang up'));

    await expect(store.ping()).resolves.toBeUndefined();
    expect(send.mock.calls[0][0]).toBeInstanceOf(HeadBucketCommand);
    await expect(store.ping()).rejects.toMatchObject({
      code: 'UNAVAILABLE',
      details: { dependency: 'object-store', cause: 'socket hang up' },
    });
  });

  it('classifies throttling and network failures as transient', () => {
    expect(isTransientS3Error(serviceError('SlowDown', 429))).toBe(true);
    expect(isTransientS3Error(serviceError('NoSuchBucket', 404))).toBe(false);
    expect(
      isTransientS3Error(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))
    ).toBe(true);
  });
});
