// src/middleware/requestId.middleware.ts
import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';

const HDR = 'x-request-id';
const MAX_LEN = 128;

/** Ensures every request has an X-Request-Id; sets req.id and echoes it in the response. */
export function requestId(req: Request, res: Response, next: NextFunction) {
  const incoming = req.get(HDR)?.trim();
  const rid = incoming && incoming.length > 0 && incoming.length <= MAX_LEN ? incoming : randomUUID();
  req.id = rid;
  res.setHeader('X-Request-Id', rid);
  next();
}
