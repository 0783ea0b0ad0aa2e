// src/utils/imageError.util.ts

export type ImageErrorKind =
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'INVALID_POSITION'
  | 'SIZE_EXCEEDED'
  | 'UNSUPPORTED_TYPE'
  | 'INVALID_REFERENCE'
  | 'IO_FAILURE'
  | 'TIMEOUT';

const STATUS_BY_KIND: Record<ImageErrorKind, number> = {
  NOT_FOUND: 404,
  FORBIDDEN: 403,
  INVALID_POSITION: 400,
  SIZE_EXCEEDED: 400,
  UNSUPPORTED_TYPE: 400,
  INVALID_REFERENCE: 400,
  IO_FAILURE: 500,
  TIMEOUT: 504,
};

/**
 * Error raised by the storage layer and the image service.
 * `code` mirrors `kind` so the JSON error handler can forward it untouched.
 */
export class ImageError extends Error {
  readonly kind: ImageErrorKind;
  readonly code: ImageErrorKind;
  readonly statusCode: number;

  constructor(kind: ImageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ImageError';
    this.kind = kind;
    this.code = kind;
    this.statusCode = STATUS_BY_KIND[kind];
  }
}

export function isImageError(err: unknown, kind?: ImageErrorKind): err is ImageError {
  if (!(err instanceof ImageError)) return false;
  return kind === undefined || err.kind === kind;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
