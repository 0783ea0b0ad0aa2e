// src/controllers/productImages.controller.ts
import type { NextFunction, Request, Response } from 'express';
import { Readable } from 'node:stream';
import type { ImageRecord, ProductImageService } from '../services/productImage.service.js';
import { authOf } from '../middleware/auth.middleware.js';
import {
  imageIdParam,
  productIdParam,
  updatePositionSchema,
  uploadImageFieldsSchema,
} from '../validation/productImage.schema.js';

type ImageResponse = { id: string; image_url: string; position: number };

function toResponse(img: ImageRecord): ImageResponse {
  return { id: img.id, image_url: img.imageUrl, position: img.position };
}

/** Fires when the client goes away before we answered. */
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

export function buildProductImagesController(images: ProductImageService) {
  /** POST /api/products/:productId/images (multipart: image, position?) */
  async function uploadProductImage(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { userId } = authOf(req);
      const { productId } = productIdParam.parse(req.params);

      const file = req.file;
      if (!file) {
        res.status(400).json({ ok: false, code: 'VALIDATION_ERROR', message: 'image file is required' });
        return;
      }

      const { position } = uploadImageFieldsSchema.parse(req.body ?? {});

      const created = await images.upload(
        {
          productId,
          requestorId: userId,
          stream: Readable.from(file.buffer),
          filename: file.originalname,
          size: file.size,
          position,
        },
        abortOnDisconnect(res),
      );

      res.status(201).json(toResponse(created));
    } catch (err) {
      next(err);
    }
  }

  /** GET /api/products/:productId/images */
  async function listProductImages(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { productId } = productIdParam.parse(req.params);
      const items = await images.listForProduct(productId);
      res.json({ items: items.map(toResponse) });
    } catch (err) {
      next(err);
    }
  }

  /** DELETE /api/images/:imageId */
  async function deleteProductImage(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { userId } = authOf(req);
      const { imageId } = imageIdParam.parse(req.params);
      await images.deleteImage(imageId, userId);
      res.json({ message: 'image deleted successfully' });
    } catch (err) {
      next(err);
    }
  }

  /** PUT /api/images/:imageId/position  body: { position } */
  async function updateProductImagePosition(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { userId } = authOf(req);
      const { imageId } = imageIdParam.parse(req.params);
      const { position } = updatePositionSchema.parse(req.body);
      await images.updatePosition(imageId, userId, position);
      res.json({ message: 'image position updated successfully' });
    } catch (err) {
      next(err);
    }
  }

  return {
    uploadProductImage,
    listProductImages,
    deleteProductImage,
    updateProductImagePosition,
  };
}
