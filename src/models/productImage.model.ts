// src/models/productImage.model.ts
import {
  DataTypes,
  Model,
  type CreationOptional,
  type InferAttributes,
  type InferCreationAttributes,
} from 'sequelize';
import { db } from './sequelize.js';

export class ProductImage extends Model<
  InferAttributes<ProductImage>,
  InferCreationAttributes<ProductImage>
> {
  declare id: string;
  declare productId: string;

  // Bare generated filename (or a full URL on rows written by older clients)
  declare imageUrl: string;

  // Display order within a listing; duplicates allowed
  declare position: CreationOptional<number>;

  declare createdAt: CreationOptional<Date>;
}

const sequelize = db.instance();

if (!sequelize) {
  if (process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test') {
    // eslint-disable-next-line no-console
    console.warn('[db] DATABASE_URL not set; ProductImage model not initialized');
  }
} else {
  ProductImage.init(
    {
      id: { type: DataTypes.CHAR(36), primaryKey: true },
      productId: { type: DataTypes.CHAR(36), allowNull: false },

      imageUrl: { type: DataTypes.STRING(255), allowNull: false },
      position: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
        validate: { min: 0 },
      },

      createdAt: { type: DataTypes.DATE, allowNull: false, defaultValue: DataTypes.NOW },
    },
    {
      sequelize,
      tableName: 'product_images',
      modelName: 'ProductImage',
      underscored: true,
      updatedAt: false,
      indexes: [
        { name: 'product_images_product_position_idx', fields: ['product_id', 'position'] },
      ],
    }
  );
}
