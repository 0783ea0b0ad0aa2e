// src/middleware/upload.middleware.ts
import multer from 'multer';
import type { UploadLimits } from '../storage/filename.storage.js';

export const IMAGE_FIELD = 'image';

/**
 * Single-file multipart parser for product images.
 * Extension/type checks stay in the storage layer so every caller gets the same rules;
 * multer only enforces the byte ceiling while buffering.
 */
export function buildImageUpload(limits: UploadLimits) {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      files: 1,
      fileSize: limits.maxBytes,
      fields: 10,
    },
  }).single(IMAGE_FIELD);
}
