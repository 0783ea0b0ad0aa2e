// src/routes/productImages.route.ts
import { Router } from 'express';
import { requireAuth, requireVendor } from '../middleware/auth.middleware.js';
import { buildImageUpload } from '../middleware/upload.middleware.js';
import { buildProductImagesController } from '../controllers/productImages.controller.js';
import type { ProductImageService } from '../services/productImage.service.js';
import type { UploadLimits } from '../storage/filename.storage.js';

export type ProductImagesRouterOptions = {
  images: ProductImageService;
  jwtSecret: string;
  limits: UploadLimits;
};

/** Mounted at /api; owns /products/:productId/images and /images/:imageId. */
export function buildProductImagesRouter(opts: ProductImagesRouterOptions): Router {
  const router: Router = Router();
  const c = buildProductImagesController(opts.images);
  const auth = requireAuth(opts.jwtSecret);

  // Public catalog read
  router.get('/products/:productId/images', c.listProductImages);

  // Order: auth → vendor gate → multer → handler
  router.post(
    '/products/:productId/images',
    auth,
    requireVendor('upload'),
    buildImageUpload(opts.limits),
    c.uploadProductImage,
  );

  router.delete('/images/:imageId', auth, requireVendor('delete'), c.deleteProductImage);
  router.put('/images/:imageId/position', auth, requireVendor('update'), c.updateProductImagePosition);

  return router;
}
