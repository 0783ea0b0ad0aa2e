// src/validation/productImage.schema.ts
import { z } from 'zod';

const idString = z.string().trim().min(1).max(64);

export const productIdParam = z.object({
  productId: idString,
});

export const imageIdParam = z.object({
  imageId: idString,
});

/** Multipart form fields arrive as strings; sign is checked by the service. */
export const uploadImageFieldsSchema = z.object({
  position: z.coerce.number().int().optional(),
});

export const updatePositionSchema = z.object({
  position: z.number().int(),
});
