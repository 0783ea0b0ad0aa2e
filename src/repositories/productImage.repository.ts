// src/repositories/productImage.repository.ts
import { ProductImage } from '../models/associations.js';

export type ProductImageRow = {
  id: string;
  productId: string;
  imageUrl: string;
  position: number;
  createdAt: Date;
};

export type NewProductImage = Omit<ProductImageRow, 'createdAt'>;

/** Metadata store for product images (the product_images table). */
export interface ProductImageStore {
  create(data: NewProductImage): Promise<ProductImageRow>;
  findById(id: string): Promise<ProductImageRow | null>;
  /** Ordered by position, then creation time, then id. */
  findByProductId(productId: string): Promise<ProductImageRow[]>;
  /** Resolves false when no row matched. */
  updatePosition(id: string, position: number): Promise<boolean>;
  /** Resolves false when no row matched. */
  delete(id: string): Promise<boolean>;
}

function toRow(m: ProductImage): ProductImageRow {
  return {
    id: String(m.id).trim(),
    productId: String(m.productId).trim(),
    imageUrl: m.imageUrl,
    position: Number(m.position ?? 0),
    createdAt: m.createdAt,
  };
}

export class SequelizeProductImageStore implements ProductImageStore {
  async create(data: NewProductImage): Promise<ProductImageRow> {
    const created = await ProductImage.create({
      id: data.id,
      productId: data.productId,
      imageUrl: data.imageUrl,
      position: data.position,
    });
    return toRow(created);
  }

  async findById(id: string): Promise<ProductImageRow | null> {
    const row = await ProductImage.findByPk(id);
    return row ? toRow(row) : null;
  }

  async findByProductId(productId: string): Promise<ProductImageRow[]> {
    const rows = await ProductImage.findAll({
      where: { productId },
      order: [['position', 'ASC'], ['createdAt', 'ASC'], ['id', 'ASC']],
    });
    return rows.map(toRow);
  }

  async updatePosition(id: string, position: number): Promise<boolean> {
    const [affected] = await ProductImage.update({ position }, { where: { id } });
    return affected > 0;
  }

  async delete(id: string): Promise<boolean> {
    const removed = await ProductImage.destroy({ where: { id } });
    return removed > 0;
  }
}
