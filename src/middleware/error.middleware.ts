// src/middleware/error.middleware.ts
import type { ErrorRequestHandler, Request, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { requestId } from '../utils/reqid.util.js';
import { ImageError } from '../utils/imageError.util.js';
import { log } from '../services/log.service.js';

type ErrorPayload = {
  ok: false;
  code: string;
  message: string;
  rid: string;
  path: string;
  details?: Array<{ path: string; message: string; code: string }>;
  stack?: string;
};

type Classified = { status: number; code: string; message: string; expose: boolean };

function numericField(err: object, key: 'statusCode' | 'status'): number | null {
  if (!(key in err)) return null;
  const v: unknown = Reflect.get(err, key);
  return typeof v === 'number' && v >= 400 && v < 600 ? v : null;
}

function stringField(err: object, key: 'code'): string | null {
  if (!(key in err)) return null;
  const v: unknown = Reflect.get(err, key);
  return typeof v === 'string' && v.length > 0 ? v : null;
}

function classify(err: unknown): Classified {
  if (err instanceof ImageError) {
    return { status: err.statusCode, code: err.code, message: err.message, expose: err.statusCode < 500 };
  }

  if (err instanceof ZodError) {
    return { status: 400, code: 'VALIDATION_ERROR', message: 'Invalid input', expose: true };
  }

  if (err instanceof multer.MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') {
      return { status: 400, code: 'SIZE_EXCEEDED', message: 'file size exceeds maximum allowed size', expose: true };
    }
    return { status: 400, code: 'UPLOAD_ERROR', message: err.message, expose: true };
  }

  if (err instanceof Error) {
    // body-parser and friends set status/statusCode on the error object
    const status = numericField(err, 'statusCode') ?? numericField(err, 'status') ?? 500;
    return {
      status,
      code: stringField(err, 'code') ?? (status >= 500 ? 'INTERNAL_SERVER_ERROR' : 'BAD_REQUEST'),
      message: err.message || 'Error',
      expose: status < 500,
    };
  }

  return { status: 500, code: 'INTERNAL_SERVER_ERROR', message: String(err), expose: false };
}

export function notFoundJson(req: Request, res: Response): void {
  res.status(404).json({
    ok: false,
    code: 'NOT_FOUND',
    message: 'route not found',
    rid: requestId(req),
    path: req.originalUrl,
  });
}

/** Last in the pipeline: converts thrown errors to JSON and hides internals in prod. */
export const jsonErrorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (res.headersSent) return;

  const c = classify(err);
  const isProd = process.env.NODE_ENV === 'production';

  if (c.status >= 500) {
    log.child({ rid: requestId(req), path: req.originalUrl }).error('http.error', {
      code: c.code,
      error: err instanceof Error ? err : String(err),
    });
  }

  const payload: ErrorPayload = {
    ok: false,
    code: c.code,
    message: c.expose || !isProd ? c.message : 'Internal server error',
    rid: requestId(req),
    path: req.originalUrl,
  };

  if (err instanceof ZodError) {
    payload.details = err.issues.map((i) => ({
      path: i.path.join('.'),
      message: i.message,
      code: i.code,
    }));
  }

  if (!isProd && c.status >= 500 && err instanceof Error && err.stack) {
    payload.stack = err.stack;
  }

  res.status(c.status).json(payload);
};
