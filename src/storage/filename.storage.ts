// src/storage/filename.storage.ts
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { ImageError } from '../utils/imageError.util.js';

export const DEFAULT_ALLOWED_EXTENSIONS: readonly string[] = ['jpg', 'jpeg', 'png', 'gif', 'webp'];
export const DEFAULT_MAX_FILE_BYTES = 10 * 1024 * 1024;

export type UploadLimits = {
  maxBytes: number;
  allowedExtensions: readonly string[];
};

export const DEFAULT_UPLOAD_LIMITS: UploadLimits = {
  maxBytes: DEFAULT_MAX_FILE_BYTES,
  allowedExtensions: DEFAULT_ALLOWED_EXTENSIONS,
};

const CONTENT_TYPES: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
};

export function contentTypeFor(ext: string): string {
  return CONTENT_TYPES[ext.toLowerCase()] ?? 'application/octet-stream';
}

/** Lower-cased text after the last dot of the base name; a bare ".png" counts as png. */
export function extensionOf(filename: string): string {
  const base = path.basename(filename);
  const dot = base.lastIndexOf('.');
  return dot < 0 ? '' : base.slice(dot + 1).toLowerCase();
}

/**
 * Size and type gate applied before any bytes are read.
 * Returns the normalized extension the stored file will carry.
 */
export function assertUploadAllowed(filename: string, size: number, limits: UploadLimits): string {
  if (!Number.isFinite(size) || size < 0) {
    throw new ImageError('SIZE_EXCEEDED', 'declared file size is invalid');
  }
  if (size > limits.maxBytes) {
    throw new ImageError(
      'SIZE_EXCEEDED',
      `file size exceeds maximum allowed size of ${limits.maxBytes} bytes`,
    );
  }

  const ext = extensionOf(filename);
  if (!ext || !limits.allowedExtensions.includes(ext)) {
    throw new ImageError(
      'UNSUPPORTED_TYPE',
      `file type ${ext ? `.${ext}` : '(none)'} not allowed. Allowed types: ${limits.allowedExtensions.join(', ')}`,
    );
  }
  return ext;
}

/** `<unix-seconds>_<8 hex>.<ext>`; never derived from the caller's filename. */
export function generateStoredFilename(ext: string, now: Date = new Date()): string {
  const timestamp = Math.floor(now.getTime() / 1000);
  const id = randomUUID().slice(0, 8);
  return `${timestamp}_${id}.${ext.toLowerCase()}`;
}

/** Last path segment of a bare name, a relative path or a full URL. Never throws. */
export function trailingSegment(reference: string): string {
  const withoutQuery = reference.trim().split(/[?#]/, 1)[0] ?? '';
  const parts = withoutQuery.split(/[\\/]/).filter((p) => p.length > 0);
  return parts.length > 0 ? parts[parts.length - 1] : '';
}

/** Stored filename for a delete; rejects traversal before the backend is touched. */
export function extractStoredName(reference: string): string {
  if (reference.includes('..')) {
    throw new ImageError('INVALID_REFERENCE', 'invalid filename');
  }
  const name = trailingSegment(reference);
  if (!name) {
    throw new ImageError('INVALID_REFERENCE', 'invalid filename');
  }
  return name;
}

export function joinUrl(base: string, name: string): string {
  const b = base.replace(/\/+$/, '');
  const n = name.replace(/^\/+/, '');
  return `${b}/${n}`;
}
