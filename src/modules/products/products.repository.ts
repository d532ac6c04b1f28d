import type { Pool, QueryResultRow } from 'pg';
import type { NewProduct, Product } from '../../connections/db/models/product.model';
import type { PageWindow } from './products.pager';
import type { ReadSpec } from './products.query';

/**
 * Storage collaborator used by the products pipeline. Implementations own durability;
 * failures are reported by rejecting.
 */
export interface ProductRepository {
  create(product: NewProduct): Promise<Product>;
  findById(id: number): Promise<Product | null>;
  // excludeId skips the product being renamed
  findByName(name: string, excludeId?: number): Promise<Product | null>;
  query(spec: ReadSpec, window: PageWindow): Promise<Product[]>;
  // null when the row no longer exists
  update(product: Product): Promise<Product | null>;
  // clears is_active and touches nothing else; null when the row does not exist
  deactivate(id: number): Promise<Product | null>;
  count(): Promise<number>;
  ping(): Promise<void>;
}

export interface SqlQuery {
  text: string;
  values: unknown[];
}

const PRODUCT_COLUMNS = 'id, name, description, price, stock, category, created_at, updated_at, is_active';

type ProductRow = Product & QueryResultRow;

/**
 * Render a read specification as one parameterised SELECT.
 * strpos() keeps % and _ in the search term literal.
 */
export const buildSelectQuery = (spec: ReadSpec, window: PageWindow): SqlQuery => {
  const conditions: string[] = [];
  const values: unknown[] = [];

  if (spec.filter.activeOnly) {
    conditions.push('is_active = TRUE');
  }

  if (spec.filter.term !== undefined) {
    values.push(spec.filter.term);
    const param = `$${values.length}`;
    conditions.push(
      `(strpos(lower(name), ${param}) > 0 OR strpos(lower(description), ${param}) > 0 OR strpos(lower(category), ${param}) > 0)`
    );
  }

  const orderBy: string[] = [];
  if (spec.order.by === 'relevance') {
    values.push(spec.order.term);
    orderBy.push(`CASE WHEN strpos(lower(name), $${values.length}) > 0 THEN 0 ELSE 1 END`);
  }
  orderBy.push('name COLLATE "C" ASC');

  values.push(window.limit);
  const limitParam = `$${values.length}`;
  values.push(window.offset);
  const offsetParam = `$${values.length}`;

  const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';

  return {
    text: `SELECT ${PRODUCT_COLUMNS} FROM products${where} ORDER BY ${orderBy.join(', ')} LIMIT ${limitParam} OFFSET ${offsetParam}`,
    values,
  };
};

export class PgProductRepository implements ProductRepository {
  constructor(private readonly pool: Pool) {}

  async create(product: NewProduct): Promise<Product> {
    const result = await this.pool.query<ProductRow>(
      `INSERT INTO products (name, description, price, stock, category, created_at, updated_at, is_active)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${PRODUCT_COLUMNS}`,
      [
        product.name,
        product.description,
        product.price,
        product.stock,
        product.category,
        product.created_at,
        product.updated_at,
        product.is_active,
      ]
    );

    return result.rows[0];
  }

  async findById(id: number): Promise<Product | null> {
    const result = await this.pool.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = $1`,
      [id]
    );

    return result.rows[0] ?? null;
  }

  async findByName(name: string, excludeId?: number): Promise<Product | null> {
    const result = await this.pool.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products
       WHERE name = $1 AND ($2::integer IS NULL OR id <> $2)
       LIMIT 1`,
      [name, excludeId ?? null]
    );

    return result.rows[0] ?? null;
  }

  async query(spec: ReadSpec, window: PageWindow): Promise<Product[]> {
    const { text, values } = buildSelectQuery(spec, window);
    const result = await this.pool.query<ProductRow>(text, values);
    return result.rows;
  }

  async update(product: Product): Promise<Product | null> {
    const result = await this.pool.query<ProductRow>(
      `UPDATE products
       SET name = $2, description = $3, price = $4, stock = $5, category = $6, updated_at = $7, is_active = $8
       WHERE id = $1
       RETURNING ${PRODUCT_COLUMNS}`,
      [
        product.id,
        product.name,
        product.description,
        product.price,
        product.stock,
        product.category,
        product.updated_at,
        product.is_active,
      ]
    );

    return result.rows[0] ?? null;
  }

  async deactivate(id: number): Promise<Product | null> {
    const result = await this.pool.query<ProductRow>(
      `UPDATE products SET is_active = FALSE WHERE id = $1 RETURNING ${PRODUCT_COLUMNS}`,
      [id]
    );

    return result.rows[0] ?? null;
  }

  async count(): Promise<number> {
    const result = await this.pool.query<{ count: number }>('SELECT COUNT(*)::integer AS count FROM products');
    return result.rows[0].count;
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
