// src/storage/DiskAdapter.storage.ts
import fs from 'node:fs';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { StorageAdapter } from './StorageAdapter.storage.js';
import {
  DEFAULT_UPLOAD_LIMITS,
  assertUploadAllowed,
  extractStoredName,
  generateStoredFilename,
  joinUrl,
  trailingSegment,
  type UploadLimits,
} from './filename.storage.js';
import { ImageError, errorMessage } from '../utils/imageError.util.js';
import { logWarn } from '../services/log.service.js';

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export class DiskAdapter implements StorageAdapter {
  readonly kind = 'local' as const;
  private readonly baseDir: string;
  private readonly publicBase: string;

  constructor(
    baseDir: string,
    publicBase = '/uploads',
    private readonly limits: UploadLimits = DEFAULT_UPLOAD_LIMITS,
  ) {
    this.baseDir = path.resolve(baseDir);
    this.publicBase = publicBase.replace(/\/+$/, '');
  }

  get directory(): string {
    return this.baseDir;
  }

  async save(stream: Readable, filename: string, size: number): Promise<string> {
    const ext = assertUploadAllowed(filename, size, this.limits);
    const storedName = generateStoredFilename(ext);
    const abs = path.join(this.baseDir, storedName);

    try {
      await fs.promises.mkdir(this.baseDir, { recursive: true });
      // 'wx' refuses to clobber an existing artifact with the same generated name
      await pipeline(stream, fs.createWriteStream(abs, { flags: 'wx' }));
    } catch (err) {
      if (errnoCode(err) !== 'EEXIST') {
        await this.removePartial(abs);
      }
      throw new ImageError('IO_FAILURE', `failed to save file: ${errorMessage(err)}`, { cause: err });
    }

    return storedName;
  }

  async delete(reference: string): Promise<void> {
    const name = extractStoredName(reference);
    try {
      await fs.promises.unlink(path.join(this.baseDir, name));
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        throw new ImageError('NOT_FOUND', 'file not found', { cause: err });
      }
      throw new ImageError('IO_FAILURE', `failed to delete file: ${errorMessage(err)}`, { cause: err });
    }
  }

  resolveUrl(reference: string): string {
    return joinUrl(this.publicBase, trailingSegment(reference));
  }

  private async removePartial(abs: string): Promise<void> {
    try {
      await fs.promises.rm(abs, { force: true });
    } catch (err) {
      logWarn('storage.disk.partial_cleanup_failed', { file: path.basename(abs), error: errorMessage(err) });
    }
  }
}
