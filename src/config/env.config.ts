// src/config/env.config.ts
import 'dotenv/config';
import { z } from 'zod';
import type { StorageKind } from '../storage/StorageAdapter.storage.js';

const DEFAULT_EXTENSIONS = 'jpg,jpeg,png,gif,webp';

/** Parse + validate env. Keep strings in process.env; expose typed helpers here. */
const envSchema = z.object({
  NODE_ENV: z.string().optional().default('development'),
  PORT: z.coerce.number().int().positive().optional().default(4000),

  DATABASE_URL: z.string().optional(),
  DB_SSL: z.string().optional(),

  JWT_SECRET: z.string().optional(),

  UPLOAD_STORAGE: z.string().optional().default('local'),
  UPLOADS_DIR: z.string().optional().default('./uploads'),
  UPLOADS_PUBLIC_BASE_URL: z.string().optional().default('http://localhost:4000/uploads'),
  UPLOAD_MAX_FILE_BYTES: z.coerce.number().int().positive().optional().default(10 * 1024 * 1024),
  UPLOAD_ALLOWED_EXTENSIONS: z.string().optional().default(DEFAULT_EXTENSIONS),

  S3_BUCKET: z.string().optional(),
  S3_REGION: z.string().optional(),
  S3_ENDPOINT: z.string().optional(),
  S3_ACCESS_KEY_ID: z.string().optional(),
  S3_SECRET_ACCESS_KEY: z.string().optional(),
  S3_PUBLIC_BASE_URL: z.string().optional(),
  S3_KEY_PREFIX: z.string().optional(),
  S3_FORCE_PATH_STYLE: z.string().optional(),

  STORAGE_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(10_000),
  DB_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(5_000),
});

export type S3Settings = {
  endpoint?: string;
  region: string;
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  publicBaseUrl: string;
  keyPrefix: string;
  forcePathStyle: boolean;
};

function asBool(v: string | undefined) {
  return v === '1' || (v ?? '').toLowerCase() === 'true';
}

function trimmed(v: string | undefined): string {
  return (v ?? '').trim();
}

function parseExtensions(raw: string): string[] {
  const list = raw
    .split(',')
    .map((e) => e.trim().toLowerCase().replace(/^\.+/, ''))
    .filter((e) => e.length > 0);
  return list.length > 0 ? Array.from(new Set(list)) : DEFAULT_EXTENSIONS.split(',');
}

/** S3 settings are only usable when bucket, credentials and public base are all present. */
function s3Settings(parsed: z.infer<typeof envSchema>): S3Settings | null {
  const bucket = trimmed(parsed.S3_BUCKET);
  const accessKeyId = trimmed(parsed.S3_ACCESS_KEY_ID);
  const secretAccessKey = trimmed(parsed.S3_SECRET_ACCESS_KEY);
  const publicBaseUrl = trimmed(parsed.S3_PUBLIC_BASE_URL);
  if (!bucket || !accessKeyId || !secretAccessKey || !publicBaseUrl) return null;

  const endpoint = trimmed(parsed.S3_ENDPOINT) || undefined;

  return {
    endpoint,
    region: trimmed(parsed.S3_REGION) || 'auto',
    bucket,
    accessKeyId,
    secretAccessKey,
    publicBaseUrl,
    keyPrefix: trimmed(parsed.S3_KEY_PREFIX),
    // custom endpoints (R2/MinIO/Supabase) usually need path-style addressing
    forcePathStyle: asBool(parsed.S3_FORCE_PATH_STYLE) || Boolean(endpoint),
  };
}

export function loadEnv(source: NodeJS.ProcessEnv) {
  const parsed = envSchema.parse(source);
  const storageKind: StorageKind =
    parsed.UPLOAD_STORAGE.trim().toLowerCase() === 's3' ? 's3' : 'local';

  return {
    nodeEnv: parsed.NODE_ENV,
    isProd: parsed.NODE_ENV === 'production',
    port: parsed.PORT,

    databaseUrl: trimmed(parsed.DATABASE_URL),
    dbSsl: parsed.DB_SSL,

    jwtSecret: trimmed(parsed.JWT_SECRET),

    storageKind,
    uploadsDir: parsed.UPLOADS_DIR,
    uploadsPublicBaseUrl: parsed.UPLOADS_PUBLIC_BASE_URL,
    maxFileBytes: parsed.UPLOAD_MAX_FILE_BYTES,
    allowedExtensions: parseExtensions(parsed.UPLOAD_ALLOWED_EXTENSIONS),
    s3: s3Settings(parsed),

    storageTimeoutMs: parsed.STORAGE_TIMEOUT_MS,
    dbTimeoutMs: parsed.DB_TIMEOUT_MS,
  } as const;
}

export type Env = ReturnType<typeof loadEnv>;

export const env: Env = loadEnv(process.env);
