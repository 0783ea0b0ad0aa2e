// src/services/productImage.service.ts
import { randomUUID } from 'node:crypto';
import type { Readable } from 'node:stream';
import type { StorageAdapter } from '../storage/StorageAdapter.storage.js';
import {
  DEFAULT_UPLOAD_LIMITS,
  assertUploadAllowed,
  type UploadLimits,
} from '../storage/filename.storage.js';
import type { ProductLookup, ProductOwner } from '../repositories/product.repository.js';
import type { ProductImageRow, ProductImageStore } from '../repositories/productImage.repository.js';
import { ImageError, errorMessage, isImageError } from '../utils/imageError.util.js';
import { withTimeout } from '../utils/timeout.util.js';
import { logInfo, logWarn } from './log.service.js';

export type ImageRecord = {
  id: string;
  productId: string;
  /** Public URL resolved through the active storage backend. */
  imageUrl: string;
  position: number;
  createdAt: Date;
};

export type UploadImageInput = {
  productId: string;
  requestorId: string;
  stream: Readable;
  filename: string;
  size: number;
  position?: number;
};

export type ServiceTimeouts = {
  storageMs: number;
  dbMs: number;
};

export type ProductImageServiceDeps = {
  storage: StorageAdapter;
  products: ProductLookup;
  images: ProductImageStore;
  limits?: UploadLimits;
  timeouts?: Partial<ServiceTimeouts>;
};

const DEFAULT_TIMEOUTS: ServiceTimeouts = { storageMs: 10_000, dbMs: 5_000 };

function assertPosition(position: number): void {
  if (!Number.isInteger(position) || position < 0) {
    throw new ImageError('INVALID_POSITION', 'image position cannot be negative');
  }
}

/**
 * Two-phase image lifecycle: file first, metadata second, with a compensating
 * file delete when the metadata write fails. Never leaves a visible record
 * pointing at a file that failed to persist; may leave an unreferenced file.
 */
export class ProductImageService {
  private readonly storage: StorageAdapter;
  private readonly products: ProductLookup;
  private readonly images: ProductImageStore;
  private readonly limits: UploadLimits;
  private readonly timeouts: ServiceTimeouts;
  private readonly pending = new Set<Promise<void>>();

  constructor(deps: ProductImageServiceDeps) {
    this.storage = deps.storage;
    this.products = deps.products;
    this.images = deps.images;
    this.limits = deps.limits ?? DEFAULT_UPLOAD_LIMITS;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...deps.timeouts };
  }

  get storageKind() {
    return this.storage.kind;
  }

  /** Resolves once every background cleanup started by a timed-out upload has finished. */
  async settle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
  }

  async upload(input: UploadImageInput, signal?: AbortSignal): Promise<ImageRecord> {
    const position = input.position ?? 0;
    assertPosition(position);
    assertUploadAllowed(input.filename, input.size, this.limits);

    await this.requireOwnedProduct(input.productId, input.requestorId, 'product');

    if (signal?.aborted) {
      throw new ImageError('IO_FAILURE', 'upload cancelled');
    }

    const saving = this.storage.save(input.stream, input.filename, input.size);
    let reference: string;
    try {
      reference = await withTimeout(saving, this.timeouts.storageMs, 'storage save');
    } catch (err) {
      if (isImageError(err, 'TIMEOUT')) this.discardLateSave(saving, err);
      throw err;
    }

    if (signal?.aborted) {
      const cancelled = new ImageError('IO_FAILURE', 'upload cancelled');
      await this.compensate(reference, cancelled);
      throw cancelled;
    }

    const id = randomUUID();
    const creating = Promise.resolve().then(() =>
      this.images.create({ id, productId: input.productId, imageUrl: reference, position }),
    );
    let row: ProductImageRow;
    try {
      row = await withTimeout(creating, this.timeouts.dbMs, 'image record create');
    } catch (err) {
      if (isImageError(err, 'TIMEOUT')) {
        this.discardLateRecord(creating, id, reference, err);
      } else {
        await this.compensate(reference, err);
      }
      throw err;
    }

    logInfo('image.uploaded', { imageId: row.id, productId: row.productId, reference });
    return this.toRecord(row);
  }

  async deleteImage(imageId: string, requestorId: string): Promise<void> {
    const image = await this.requireImage(imageId);
    await this.requireOwnedProduct(image.productId, requestorId, 'image');

    try {
      await withTimeout(this.storage.delete(image.imageUrl), this.timeouts.storageMs, 'storage delete');
    } catch (err) {
      // Removing the listing wins over keeping it around for a file we could not delete
      logWarn('image.file_delete_failed', {
        imageId,
        reference: image.imageUrl,
        error: errorMessage(err),
      });
    }

    const removed = await withTimeout(this.images.delete(imageId), this.timeouts.dbMs, 'image record delete');
    if (!removed) {
      throw new ImageError('NOT_FOUND', 'image not found');
    }
    logInfo('image.deleted', { imageId, productId: image.productId });
  }

  async updatePosition(imageId: string, requestorId: string, newPosition: number): Promise<void> {
    assertPosition(newPosition);

    const image = await this.requireImage(imageId);
    await this.requireOwnedProduct(image.productId, requestorId, 'image');

    const updated = await withTimeout(
      this.images.updatePosition(imageId, newPosition),
      this.timeouts.dbMs,
      'image position update',
    );
    if (!updated) {
      throw new ImageError('NOT_FOUND', 'image not found');
    }
  }

  async listForProduct(productId: string): Promise<ImageRecord[]> {
    const rows = await withTimeout(
      this.images.findByProductId(productId),
      this.timeouts.dbMs,
      'image list',
    );
    return rows.map((r) => this.toRecord(r));
  }

  private async requireImage(imageId: string): Promise<ProductImageRow> {
    const image = await withTimeout(this.images.findById(imageId), this.timeouts.dbMs, 'image lookup');
    if (!image) {
      throw new ImageError('NOT_FOUND', 'image not found');
    }
    return image;
  }

  private async requireOwnedProduct(
    productId: string,
    requestorId: string,
    subject: 'product' | 'image',
  ): Promise<ProductOwner> {
    const product = await withTimeout(
      this.products.findById(productId),
      this.timeouts.dbMs,
      'product lookup',
    );
    if (!product) {
      throw new ImageError('NOT_FOUND', 'product not found');
    }
    if (product.ownerId !== requestorId) {
      throw new ImageError('FORBIDDEN', `unauthorized: ${subject} does not belong to this vendor`);
    }
    return product;
  }

  /** Best-effort rollback of phase one; its own failure is logged, never thrown. */
  private async compensate(reference: string, cause: unknown): Promise<void> {
    try {
      await withTimeout(this.storage.delete(reference), this.timeouts.storageMs, 'compensating delete');
    } catch (err) {
      logWarn('image.compensation_failed', {
        reference,
        cause: errorMessage(cause),
        error: errorMessage(err),
      });
    }
  }

  private track(work: Promise<void>): void {
    const done = work.finally(() => {
      this.pending.delete(done);
    });
    this.pending.add(done);
  }

  /** A save we stopped waiting for may still land; remove the file when it does. */
  private discardLateSave(saving: Promise<string>, cause: ImageError): void {
    this.track(
      saving.then(
        (reference) => this.compensate(reference, cause),
        (err: unknown) => {
          // adapters remove their own partial artifacts before rejecting
          logInfo('image.late_save_failed', { cause: cause.message, error: errorMessage(err) });
        },
      ),
    );
  }

  /**
   * An insert we stopped waiting for may still commit. The row goes first so it
   * never outlives its file; if the row cannot be removed the file stays with it.
   */
  private discardLateRecord(
    creating: Promise<ProductImageRow>,
    id: string,
    reference: string,
    cause: ImageError,
  ): void {
    this.track(
      creating.then(
        async () => {
          try {
            await withTimeout(this.images.delete(id), this.timeouts.dbMs, 'late image record delete');
          } catch (err) {
            logWarn('image.late_record_cleanup_failed', {
              imageId: id,
              reference,
              error: errorMessage(err),
            });
            return;
          }
          await this.compensate(reference, cause);
        },
        () => this.compensate(reference, cause),
      ),
    );
  }

  private toRecord(row: ProductImageRow): ImageRecord {
    return {
      id: row.id,
      productId: row.productId,
      imageUrl: this.storage.resolveUrl(row.imageUrl),
      position: row.position,
      createdAt: row.createdAt,
    };
  }
}
