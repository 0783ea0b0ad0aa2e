// src/services/log.service.ts

// Single-line JSON logger. Field values pass through redact() so storage
// credentials, bearer tokens and presigned URL signatures never reach stdout.

type Level = 'info' | 'warn' | 'error';
type Fields = Record<string, unknown>;

export type Logger = {
  info(event: string, fields?: Fields): void;
  warn(event: string, fields?: Fields): void;
  error(event: string, fields?: Fields): void;
  child(bound: Fields): Logger;
};

const MASK = '***';

const SECRET_KEYS: RegExp[] = [
  /pass/i,
  /secret/i,
  /token/i,
  /api[_-]?key/i,
  /access[_-]?key/i,
  /^auth(orization)?$/i,
  /cookie/i,
  /^x-amz-/i,
  /signature/i,
];

const SECRET_VALUE_HINTS = ['bearer ', 'x-amz-credential', 'eyj'];

// X-Amz-Signature=..., Signature=..., token=... inside a query string
const SIGNED_QUERY_RE = /([?&](?:x-amz-[a-z-]+|signature|token|sig)=)[^&#\s]*/gi;

const OPAQUE_RE = /^[A-Za-z0-9._\-+/=]{40,}$/;

function isSecretKey(key: string): boolean {
  return SECRET_KEYS.some((re) => re.test(key));
}

function maskString(v: string): string {
  const lower = v.toLowerCase();
  if (SECRET_VALUE_HINTS.some((h) => lower.includes(h))) return MASK;

  const unsigned = v.replace(SIGNED_QUERY_RE, `$1${MASK}`);
  if (unsigned !== v) return unsigned;

  if (OPAQUE_RE.test(v)) return `${v.slice(0, 6)}…REDACTED`;
  return v;
}

function errorFields(err: Error): Fields {
  const out: Fields = { name: err.name, message: err.message };
  if ('code' in err && typeof err.code === 'string') out.code = err.code;
  return out;
}

export function redact(input: unknown, depth = 4): unknown {
  if (input == null) return input;
  if (typeof input === 'string') return maskString(input);
  if (typeof input !== 'object') return input;
  if (depth <= 0) return '[truncated]';

  if (input instanceof Error) return redact(errorFields(input), depth - 1);
  if (input instanceof Date) return input.toISOString();
  if (Array.isArray(input)) return input.map((x) => redact(x, depth - 1));

  const out: Fields = {};
  for (const [k, v] of Object.entries(input)) {
    out[k] = isSecretKey(k) ? MASK : redact(v, depth - 1);
  }
  return out;
}

function safe(fields: Fields): Fields {
  try {
    const r = redact(fields);
    return typeof r === 'object' && r !== null && !Array.isArray(r) ? { ...r } : {};
  } catch {
    return { _redactError: true };
  }
}

function write(level: Level, event: string, fields: Fields): void {
  const entry = { ts: new Date().toISOString(), level, event, ...safe(fields) };
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(entry));
}

function makeLogger(bound: Fields): Logger {
  return {
    info: (event, fields) => write('info', event, { ...bound, ...fields }),
    warn: (event, fields) => write('warn', event, { ...bound, ...fields }),
    error: (event, fields) => write('error', event, { ...bound, ...fields }),
    child: (more) => makeLogger({ ...bound, ...more }),
  };
}

export const log: Logger = makeLogger({});

export const logInfo = (event: string, fields?: Fields) => log.info(event, fields);
export const logWarn = (event: string, fields?: Fields) => log.warn(event, fields);
export const logError = (event: string, fields?: Fields) => log.error(event, fields);
