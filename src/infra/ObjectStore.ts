import type { Readable } from 'node:stream';

export type StoredObject = {
  key: string;
  sizeBytes: number;
};

/**
 * Blob storage for inputs, intermediate stage artifacts and published books.
 * Keys passed in are relative; implementations apply the configured path prefix.
 */
export interface ObjectStore {
  put(key: string, body: Buffer, contentType: string): Promise<StoredObject>;
  get(key: string): Promise<Buffer>;
  stream(key: string): Promise<Readable>;
  head(key: string): Promise<StoredObject>;
  delete(key: string): Promise<void>;
  ping(): Promise<void>;
}

/**
 * Joins key segments with single slashes, ignoring empty segments
 */
export function joinKey(...segments: string[]): string {
  return segments
    .map((segment) => segment.replace(/^\/+|\/+$/g, ''))
    .filter((segment) => segment.length > 0)
    .join('/');
}
