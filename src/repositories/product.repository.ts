// src/repositories/product.repository.ts
import { Product } from '../models/associations.js';

export type ProductOwner = {
  id: string;
  ownerId: string;
};

export interface ProductLookup {
  findById(id: string): Promise<ProductOwner | null>;
}

export class SequelizeProductLookup implements ProductLookup {
  async findById(id: string): Promise<ProductOwner | null> {
    const row = await Product.findByPk(id, { attributes: ['id', 'userId'] });
    if (!row) return null;
    return { id: String(row.id).trim(), ownerId: String(row.userId).trim() };
  }
}
