import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadEnv } from '../src/config/env.config.js';
import { DiskAdapter, S3Adapter, createStorageAdapter, uploadLimitsFrom } from '../src/storage/index.js';
import { loggedEvents } from './helpers/fakes.js';

const s3Env = {
  UPLOAD_STORAGE: 'S3',
  S3_BUCKET: 'product-images',
  S3_ACCESS_KEY_ID: 'test-key',
  S3_SECRET_ACCESS_KEY: 'test-secret',
  S3_PUBLIC_BASE_URL: 'https://cdn.test',
};

describe('loadEnv', () => {
  it('applies defaults', () => {
    const cfg = loadEnv({});
    expect(cfg).toMatchObject({
      nodeEnv: 'development',
      isProd: false,
      port: 4000,
      jwtSecret: '',
      storageKind: 'local',
      uploadsDir: './uploads',
      uploadsPublicBaseUrl: 'http://localhost:4000/uploads',
      maxFileBytes: 10_485_760,
      allowedExtensions: ['jpg', 'jpeg', 'png', 'gif', 'webp'],
      s3: null,
      storageTimeoutMs: 10_000,
      dbTimeoutMs: 5_000,
    });
  });

  it('normalizes the extension list', () => {
    const cfg = loadEnv({ UPLOAD_ALLOWED_EXTENSIONS: ' .PNG, jpg ,png,' });
    expect(cfg.allowedExtensions).toEqual(['png', 'jpg']);
  });

  it('coerces numeric settings', () => {
    const cfg = loadEnv({ PORT: '8080', UPLOAD_MAX_FILE_BYTES: '2048', STORAGE_TIMEOUT_MS: '250' });
    expect(cfg.port).toBe(8080);
    expect(cfg.maxFileBytes).toBe(2048);
    expect(cfg.storageTimeoutMs).toBe(250);
  });

  it('rejects a non-numeric size limit', () => {
    expect(() => loadEnv({ UPLOAD_MAX_FILE_BYTES: 'lots' })).toThrow();
  });

  it('builds S3 settings only when complete', () => {
    expect(loadEnv({ ...s3Env, S3_BUCKET: '' }).s3).toBeNull();

    const cfg = loadEnv({ ...s3Env, S3_ENDPOINT: 'http://minio.test:9000' });
    expect(cfg.storageKind).toBe('s3');
    expect(cfg.s3).toEqual({
      endpoint: 'http://minio.test:9000',
      region: 'auto',
      bucket: 'product-images',
      accessKeyId: 'test-key',
      secretAccessKey: 'test-secret',
      publicBaseUrl: 'https://cdn.test',
      keyPrefix: '',
      forcePathStyle: true,
    });
  });
});

describe('createStorageAdapter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses local disk by default', () => {
    const adapter = createStorageAdapter(loadEnv({ UPLOADS_PUBLIC_BASE_URL: 'http://img.test/uploads' }));
    expect(adapter).toBeInstanceOf(DiskAdapter);
    expect(adapter.resolveUrl('a.png')).toBe('http://img.test/uploads/a.png');
  });

  it('uses S3 when configured', () => {
    const adapter = createStorageAdapter(loadEnv(s3Env));
    expect(adapter).toBeInstanceOf(S3Adapter);
    expect(adapter.kind).toBe('s3');
  });

  it('falls back to disk and warns when S3 settings are incomplete', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const adapter = createStorageAdapter(loadEnv({ UPLOAD_STORAGE: 's3' }));

    expect(adapter).toBeInstanceOf(DiskAdapter);
    expect(loggedEvents(spy.mock.calls).map((e) => e.event)).toContain('storage.s3.misconfigured');
  });

  it('derives upload limits from config', () => {
    const cfg = loadEnv({ UPLOAD_MAX_FILE_BYTES: '100', UPLOAD_ALLOWED_EXTENSIONS: 'png' });
    expect(uploadLimitsFrom(cfg)).toEqual({ maxBytes: 100, allowedExtensions: ['png'] });
  });
});
