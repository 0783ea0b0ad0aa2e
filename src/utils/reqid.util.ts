// src/utils/reqid.util.ts
import type { Request } from 'express';

/**
 * Returns a stable request id:
 * 1) prefer req.id (set by requestId middleware),
 * 2) then X-Request-Id header,
 * 3) else 'req-unknown'.
 */
export function requestId(req: Request): string {
  const fromProp = req.id;
  if (typeof fromProp === 'string' && fromProp.trim().length > 0) {
    return fromProp.trim();
  }

  const hdr = req.get('x-request-id')?.trim();
  if (hdr && hdr.length > 0) return hdr;

  return 'req-unknown';
}
