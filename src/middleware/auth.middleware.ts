// src/middleware/auth.middleware.ts
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt, { type JwtPayload } from 'jsonwebtoken';

type ErrorBody = { ok: false; code: string; message: string };

function reject(res: Response, status: number, code: string, message: string): void {
  const body: ErrorBody = { ok: false, code, message };
  res.status(status).json(body);
}

/** Reads `user_id` / `role` from a verified token payload. */
function claimsFrom(payload: string | JwtPayload): Express.AuthClaims | null {
  if (typeof payload === 'string') return null;
  const userId = payload.user_id;
  const role = payload.role;
  if (typeof userId !== 'string' || userId.length === 0) return null;
  if (typeof role !== 'string' || role.length === 0) return null;
  return { userId, role: role.toLowerCase() };
}

/** Require a valid `Authorization: Bearer <jwt>`; attaches req.auth. */
export function requireAuth(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.get('authorization');
    if (!header) {
      reject(res, 401, 'UNAUTHORIZED', 'missing authorization header');
      return;
    }

    const parts = header.split(' ');
    if (parts.length !== 2 || parts[0] !== 'Bearer' || !parts[1]) {
      reject(res, 401, 'UNAUTHORIZED', 'invalid authorization header format');
      return;
    }

    if (!secret) {
      reject(res, 401, 'UNAUTHORIZED', 'invalid or expired token');
      return;
    }

    let claims: Express.AuthClaims | null = null;
    try {
      claims = claimsFrom(jwt.verify(parts[1], secret, { algorithms: ['HS256'] }));
    } catch {
      claims = null;
    }
    if (!claims) {
      reject(res, 401, 'UNAUTHORIZED', 'invalid or expired token');
      return;
    }

    req.auth = claims;
    next();
  };
}

/** Require the vendor role; `action` completes "only vendors can … product images". */
export function requireVendor(action: 'upload' | 'delete' | 'update'): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.auth) {
      reject(res, 401, 'UNAUTHORIZED', 'unauthorized user');
      return;
    }
    if (req.auth.role !== 'vendor') {
      reject(res, 403, 'FORBIDDEN', `only vendors can ${action} product images`);
      return;
    }
    next();
  };
}

/** Narrowing helper for controllers mounted behind requireAuth. */
export function authOf(req: Request): Express.AuthClaims {
  if (!req.auth) {
    throw Object.assign(new Error('unauthorized user'), { statusCode: 401, code: 'UNAUTHORIZED' });
  }
  return req.auth;
}
