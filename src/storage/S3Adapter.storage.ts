// src/storage/S3Adapter.storage.ts
import type { Readable } from 'node:stream';
import {
  DeleteObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import type { StorageAdapter } from './StorageAdapter.storage.js';
import type { S3Settings } from '../config/env.config.js';
import {
  DEFAULT_UPLOAD_LIMITS,
  assertUploadAllowed,
  contentTypeFor,
  extractStoredName,
  generateStoredFilename,
  joinUrl,
  trailingSegment,
  type UploadLimits,
} from './filename.storage.js';
import { ImageError, errorMessage } from '../utils/imageError.util.js';
import { logWarn } from '../services/log.service.js';

function isMissingObject(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === 'NotFound' || err.name === 'NoSuchKey') return true;
  if ('$metadata' in err) {
    const meta = err.$metadata;
    return typeof meta === 'object' && meta !== null && 'httpStatusCode' in meta && meta.httpStatusCode === 404;
  }
  return false;
}

export class S3Adapter implements StorageAdapter {
  readonly kind = 's3' as const;
  private readonly client: S3Client;

  constructor(
    private readonly cfg: S3Settings,
    private readonly limits: UploadLimits = DEFAULT_UPLOAD_LIMITS,
  ) {
    this.client = new S3Client({
      region: cfg.region,
      endpoint: cfg.endpoint,
      forcePathStyle: cfg.forcePathStyle,
      credentials: {
        accessKeyId: cfg.accessKeyId,
        secretAccessKey: cfg.secretAccessKey,
      },
    });
  }

  private keyFor(name: string): string {
    const prefix = this.cfg.keyPrefix ? this.cfg.keyPrefix.replace(/^\/+|\/+$/g, '') + '/' : '';
    return `${prefix}${name}`;
  }

  async save(stream: Readable, filename: string, size: number): Promise<string> {
    const ext = assertUploadAllowed(filename, size, this.limits);
    const storedName = generateStoredFilename(ext);
    const key = this.keyFor(storedName);

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.cfg.bucket,
          Key: key,
          Body: stream,
          ContentLength: size,
          ContentType: contentTypeFor(ext),
          // generated names are never reused
          CacheControl: 'public, max-age=31536000, immutable',
        }),
      );
    } catch (err) {
      await this.removePartial(key);
      throw new ImageError('IO_FAILURE', `failed to upload file: ${errorMessage(err)}`, { cause: err });
    }

    return storedName;
  }

  async delete(reference: string): Promise<void> {
    const key = this.keyFor(extractStoredName(reference));

    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.cfg.bucket, Key: key }));
    } catch (err) {
      if (isMissingObject(err)) {
        throw new ImageError('NOT_FOUND', 'file not found', { cause: err });
      }
      throw new ImageError('IO_FAILURE', `failed to delete file: ${errorMessage(err)}`, { cause: err });
    }

    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.cfg.bucket, Key: key }));
    } catch (err) {
      throw new ImageError('IO_FAILURE', `failed to delete file: ${errorMessage(err)}`, { cause: err });
    }
  }

  resolveUrl(reference: string): string {
    return joinUrl(this.cfg.publicBaseUrl, this.keyFor(trailingSegment(reference)));
  }

  /** S3 puts are atomic, but a multipart body can leave an object behind on some providers. */
  private async removePartial(key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.cfg.bucket, Key: key }));
    } catch (err) {
      logWarn('storage.s3.partial_cleanup_failed', { key, error: errorMessage(err) });
    }
  }
}
