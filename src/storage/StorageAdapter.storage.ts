// src/storage/StorageAdapter.storage.ts
import type { Readable } from 'node:stream';

export type StorageKind = 'local' | 's3';

/**
 * Backend-neutral file storage. Callers hold references (generated filenames)
 * and never touch the physical artifact directly.
 */
export interface StorageAdapter {
  readonly kind: StorageKind;

  /** Copies the stream under a freshly generated name and returns that name. */
  save(stream: Readable, filename: string, size: number): Promise<string>;

  /** Accepts a bare name or a full locator; only the trailing segment is used. */
  delete(reference: string): Promise<void>;

  /** Pure mapping from reference to public URL. */
  resolveUrl(reference: string): string;
}
