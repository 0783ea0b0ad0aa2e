// src/app.ts
import express, { type Express } from 'express';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import { requestId } from './middleware/requestId.middleware.js';
import { jsonErrorHandler, notFoundJson } from './middleware/error.middleware.js';
import { registerUploadsStatic } from './middleware/uploadsStatic.js';
import { buildHealthRouter } from './routes/health.route.js';
import { buildProductImagesRouter } from './routes/productImages.route.js';
import type { ReadinessProbe } from './controllers/health.controller.js';
import type { ProductImageService } from './services/productImage.service.js';
import type { UploadLimits } from './storage/filename.storage.js';

export type AppOptions = {
  images: ProductImageService;
  jwtSecret: string;
  limits: UploadLimits;
  ping: ReadinessProbe;
  /** Local backend directory to serve under /uploads; omit for remote storage. */
  uploadsDir?: string;
  accessLog?: boolean;
};

export function createApp(opts: AppOptions): Express {
  const app: Express = express();

  app.set('trust proxy', true);

  app.use(
    helmet({
      // images are embedded by the storefront on another origin
      crossOriginResourcePolicy: { policy: 'cross-origin' },
    }),
  );
  app.use(compression());
  if (opts.accessLog ?? true) {
    app.use(morgan('tiny'));
  }

  app.use(requestId);

  app.use(express.json({ limit: '1mb' }));

  if (opts.uploadsDir) {
    registerUploadsStatic(app, opts.uploadsDir);
  }

  app.use('/api', buildHealthRouter(opts.images.storageKind, opts.ping));
  app.use('/api', buildProductImagesRouter(opts));
  app.use('/api', notFoundJson);

  app.use(jsonErrorHandler);

  return app;
}
