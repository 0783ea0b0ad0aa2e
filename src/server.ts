// src/server.ts
import { createServer } from 'node:http';
import { env } from './config/env.config.js';
import { createApp } from './app.js';
import { db } from './models/sequelize.js';
import { SequelizeProductLookup } from './repositories/product.repository.js';
import { SequelizeProductImageStore } from './repositories/productImage.repository.js';
import { ProductImageService } from './services/productImage.service.js';
import { DiskAdapter, getStorageAdapter, uploadLimitsFrom } from './storage/index.js';
import { logError, logInfo, logWarn } from './services/log.service.js';
import { errorMessage } from './utils/imageError.util.js';

if (!env.jwtSecret) {
  logError('config.missing', { key: 'JWT_SECRET' });
  process.exit(1);
}
if (!db.isConfigured) {
  logError('config.missing', { key: 'DATABASE_URL' });
  process.exit(1);
}

const storage = getStorageAdapter();
const limits = uploadLimitsFrom(env);

const images = new ProductImageService({
  storage,
  products: new SequelizeProductLookup(),
  images: new SequelizeProductImageStore(),
  limits,
  timeouts: { storageMs: env.storageTimeoutMs, dbMs: env.dbTimeoutMs },
});

const app = createApp({
  images,
  jwtSecret: env.jwtSecret,
  limits,
  ping: () => db.ping(),
  uploadsDir: storage instanceof DiskAdapter ? storage.directory : undefined,
});

const server = createServer(app);

(async () => {
  const result = await db.ping();
  if (result.ok) {
    logInfo('db.connected');
  } else {
    logWarn('db.unavailable', { error: result.error ?? 'unknown error' });
  }

  server.listen(env.port, () => {
    logInfo('server.listening', { port: env.port, storage: storage.kind });
  });
})().catch((err: unknown) => {
  logError('server.start_failed', { error: errorMessage(err) });
  process.exit(1);
});

async function shutdown(signal: NodeJS.Signals) {
  logInfo('server.shutdown', { signal });
  try {
    await new Promise<void>((resolve, reject) => {
      server.close((err?: Error) => (err ? reject(err) : resolve()));
    });
    await images.settle();
    const s = db.instance();
    if (s) await s.close();
    process.exit(0);
  } catch (err) {
    logError('server.shutdown_failed', { error: errorMessage(err) });
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
