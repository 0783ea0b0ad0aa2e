// src/models/associations.ts
import { db } from './sequelize.js';
import { Product } from './product.model.js';
import { ProductImage } from './productImage.model.js';

// Deleting a product drops its image rows; stored files are not touched on that path.
if (db.instance()) {
  Product.hasMany(ProductImage, {
    as: 'images',
    foreignKey: { name: 'productId', field: 'product_id' },
    onDelete: 'CASCADE',
  });
  ProductImage.belongsTo(Product, {
    as: 'product',
    foreignKey: { name: 'productId', field: 'product_id' },
    onDelete: 'CASCADE',
  });
}

export { Product, ProductImage };
