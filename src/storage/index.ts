// src/storage/index.ts
import type { StorageAdapter } from './StorageAdapter.storage.js';
import { DiskAdapter } from './DiskAdapter.storage.js';
import { S3Adapter } from './S3Adapter.storage.js';
import type { UploadLimits } from './filename.storage.js';
import { env, type Env } from '../config/env.config.js';
import { logWarn } from '../services/log.service.js';

let adapter: StorageAdapter | null = null;

export function uploadLimitsFrom(cfg: Env): UploadLimits {
  return { maxBytes: cfg.maxFileBytes, allowedExtensions: cfg.allowedExtensions };
}

export function createStorageAdapter(cfg: Env): StorageAdapter {
  const limits = uploadLimitsFrom(cfg);

  if (cfg.storageKind === 's3') {
    if (cfg.s3) return new S3Adapter(cfg.s3, limits);
    logWarn('storage.s3.misconfigured', {
      message: 'UPLOAD_STORAGE=s3 but S3 settings are incomplete; using local disk',
    });
  }

  return new DiskAdapter(cfg.uploadsDir, cfg.uploadsPublicBaseUrl, limits);
}

/** Chosen once per process from UPLOAD_STORAGE. */
export function getStorageAdapter(): StorageAdapter {
  adapter ??= createStorageAdapter(env);
  return adapter;
}

export type { StorageAdapter, StorageKind } from './StorageAdapter.storage.js';
export { DiskAdapter } from './DiskAdapter.storage.js';
export { S3Adapter } from './S3Adapter.storage.js';
export * from './filename.storage.js';
