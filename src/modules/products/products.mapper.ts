import type { Product } from '../../connections/db/models/product.model';
import type { ProductResponse } from '../../types/response.types';

/**
 * Fixed-point form stored in NUMERIC(18,2)
 */
export const toFixedPrice = (price: number): string => price.toFixed(2);

/**
 * Row → wire. Price becomes a double (rounding accepted), timestamps ISO-8601,
 * a missing updated_at an empty string.
 */
export const toProductResponse = (product: Product): ProductResponse => ({
  id: product.id,
  name: product.name,
  description: product.description,
  price: Number(product.price),
  stock: product.stock,
  category: product.category,
  createdAt: product.created_at.toISOString(),
  updatedAt: product.updated_at ? product.updated_at.toISOString() : '',
  isActive: product.is_active,
});
