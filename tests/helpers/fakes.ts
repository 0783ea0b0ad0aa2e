import type { Readable } from 'node:stream';
import { expect } from 'vitest';
import type { StorageAdapter } from '../../src/storage/StorageAdapter.storage.js';
import {
  extensionOf,
  extractStoredName,
  joinUrl,
  trailingSegment,
} from '../../src/storage/filename.storage.js';
import type { ProductLookup, ProductOwner } from '../../src/repositories/product.repository.js';
import type {
  NewProductImage,
  ProductImageRow,
  ProductImageStore,
} from '../../src/repositories/productImage.repository.js';
import { ImageError, type ImageErrorKind } from '../../src/utils/imageError.util.js';

export const PUBLIC_BASE = 'http://cdn.test/uploads';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** In-memory backend; names are `file-<n>.<ext>` so assertions stay exact. */
export class MemoryStorage implements StorageAdapter {
  readonly kind = 'local' as const;
  readonly files = new Map<string, Buffer>();
  saveCalls = 0;
  deleteCalls = 0;
  failSave: Error | null = null;
  failDelete: Error | null = null;
  hangSave = false;
  saveDelayMs = 0;
  onSaved: (() => void) | null = null;
  private seq = 0;

  async save(stream: Readable, filename: string, _size: number): Promise<string> {
    this.saveCalls += 1;
    if (this.failSave) throw this.failSave;
    if (this.hangSave) return new Promise<string>(() => undefined);

    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    if (this.saveDelayMs > 0) await sleep(this.saveDelayMs);
    this.seq += 1;
    const name = `file-${this.seq}.${extensionOf(filename)}`;
    this.files.set(name, Buffer.concat(chunks));
    this.onSaved?.();
    return name;
  }

  async delete(reference: string): Promise<void> {
    this.deleteCalls += 1;
    if (this.failDelete) throw this.failDelete;
    const name = extractStoredName(reference);
    if (!this.files.delete(name)) {
      throw new ImageError('NOT_FOUND', 'file not found');
    }
  }

  resolveUrl(reference: string): string {
    return joinUrl(PUBLIC_BASE, trailingSegment(reference));
  }
}

export class MemoryProducts implements ProductLookup {
  readonly products = new Map<string, ProductOwner>();
  lookups = 0;

  add(id: string, ownerId: string): this {
    this.products.set(id, { id, ownerId });
    return this;
  }

  async findById(id: string): Promise<ProductOwner | null> {
    this.lookups += 1;
    return this.products.get(id) ?? null;
  }
}

export class MemoryImageStore implements ProductImageStore {
  readonly rows: ProductImageRow[] = [];
  createCalls = 0;
  failCreate: Error | null = null;
  failDelete: Error | null = null;
  createDelayMs = 0;
  private clock = Date.parse('2024-05-01T00:00:00.000Z');

  async create(data: NewProductImage): Promise<ProductImageRow> {
    this.createCalls += 1;
    if (this.createDelayMs > 0) await sleep(this.createDelayMs);
    if (this.failCreate) throw this.failCreate;
    this.clock += 1000;
    const row: ProductImageRow = { ...data, createdAt: new Date(this.clock) };
    this.rows.push(row);
    return { ...row };
  }

  async findById(id: string): Promise<ProductImageRow | null> {
    const row = this.rows.find((r) => r.id === id);
    return row ? { ...row } : null;
  }

  async findByProductId(productId: string): Promise<ProductImageRow[]> {
    return this.rows
      .filter((r) => r.productId === productId)
      .sort(
        (a, b) =>
          a.position - b.position ||
          a.createdAt.getTime() - b.createdAt.getTime() ||
          a.id.localeCompare(b.id),
      )
      .map((r) => ({ ...r }));
  }

  async updatePosition(id: string, position: number): Promise<boolean> {
    const row = this.rows.find((r) => r.id === id);
    if (!row) return false;
    row.position = position;
    return true;
  }

  async delete(id: string): Promise<boolean> {
    if (this.failDelete) throw this.failDelete;
    const idx = this.rows.findIndex((r) => r.id === id);
    if (idx < 0) return false;
    this.rows.splice(idx, 1);
    return true;
  }
}

/** Awaits a rejection and checks it is an ImageError of the given kind. */
export async function expectImageError(
  work: Promise<unknown>,
  kind: ImageErrorKind,
  message?: string,
): Promise<ImageError> {
  let caught: unknown = null;
  try {
    await work;
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(ImageError);
  if (!(caught instanceof ImageError)) throw new Error('expected an ImageError');
  expect(caught.kind).toBe(kind);
  if (message !== undefined) expect(caught.message).toBe(message);
  return caught;
}

/** Parsed JSON log lines captured from a console.log spy. */
export function loggedEvents(calls: unknown[][]): Array<Record<string, unknown>> {
  const out: Array<Record<string, unknown>> = [];
  for (const args of calls) {
    const line = args[0];
    if (typeof line !== 'string') continue;
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      out.push(Object.fromEntries(Object.entries(parsed)));
    }
  }
  return out;
}
