// src/middleware/uploadsStatic.ts
import express from 'express';

export const UPLOADS_PUBLIC_ROUTE = '/uploads';

/** Serves the local disk backend; generated names never change, so cache hard. */
export function registerUploadsStatic(app: express.Express, dir: string): void {
  app.use(
    UPLOADS_PUBLIC_ROUTE,
    express.static(dir, {
      index: false,
      etag: true,
      maxAge: '1y',
      immutable: true,
      fallthrough: true,
      dotfiles: 'deny',
    }),
  );
}
