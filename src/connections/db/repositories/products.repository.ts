import { MAX_QUANTITY } from '../../../constants';
import { CreateProductInput, Product, ProductWithUsage, UpdateProductInput } from '../models';
import { Queryable } from './types';

export interface ProductRepository {
  list(): Promise<ProductWithUsage[]>;
  findById(id: number): Promise<ProductWithUsage | null>;
  create(input: CreateProductInput): Promise<Product>;
  update(id: number, input: UpdateProductInput): Promise<Product | null>;
  delete(id: number): Promise<boolean>;
  getStock(id: number): Promise<number | null>;
  /**
   * Conditional decrement: only succeeds while stock_qty >= qty.
   * Resolves the new stock, or null when no row matched.
   */
  decrementStockIfAvailable(id: number, qty: number): Promise<number | null>;
  /** Takes the row locks in the order given */
  lockForUpdate(ids: number[]): Promise<void>;
  /** Resolves null when no row matched or the sum would not fit the column */
  incrementStock(id: number, qty: number): Promise<number | null>;
}

const PRODUCT_COLUMNS = 'id, name, price, unit, stock_qty, is_active, created_at, updated_at';

const USAGE_SELECT = `
  SELECT p.id, p.name, p.price, p.unit, p.stock_qty, p.is_active, p.created_at, p.updated_at,
         (SELECT COUNT(*)::int FROM shipments s WHERE s.product_id = p.id) AS shipments_count
  FROM products p
`;

export const createProductRepository = (db: Queryable): ProductRepository => ({
  async list() {
    const result = await db.query<ProductWithUsage>(`${USAGE_SELECT} ORDER BY p.created_at DESC, p.id DESC`);
    return result.rows;
  },

  async findById(id) {
    const result = await db.query<ProductWithUsage>(`${USAGE_SELECT} WHERE p.id = $1`, [id]);
    return result.rows[0] ?? null;
  },

  async create(input) {
    const result = await db.query<Product>(
      `INSERT INTO products (name, price, unit, stock_qty, is_active)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${PRODUCT_COLUMNS}`,
      [input.name, input.price, input.unit ?? 'KG', input.stock_qty ?? 0, input.is_active ?? true]
    );
    return result.rows[0];
  },

  async update(id, input) {
    const fields: string[] = [];
    const params: unknown[] = [];

    const set = (column: string, value: unknown) => {
      params.push(value);
      fields.push(`${column} = $${params.length}`);
    };

    if (input.name !== undefined) set('name', input.name);
    if (input.price !== undefined) set('price', input.price);
    if (input.unit !== undefined) set('unit', input.unit);
    if (input.is_active !== undefined) set('is_active', input.is_active);

    params.push(id);
    const result = await db.query<Product>(
      `UPDATE products
       SET ${[...fields, 'updated_at = NOW()'].join(', ')}
       WHERE id = $${params.length}
       RETURNING ${PRODUCT_COLUMNS}`,
      params
    );
    return result.rows[0] ?? null;
  },

  async delete(id) {
    const result = await db.query('DELETE FROM products WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  },

  async getStock(id) {
    const result = await db.query<{ stock_qty: number }>('SELECT stock_qty FROM products WHERE id = $1', [id]);
    return result.rows[0]?.stock_qty ?? null;
  },

  async decrementStockIfAvailable(id, qty) {
    const result = await db.query<{ stock_qty: number }>(
      `UPDATE products
       SET stock_qty = stock_qty - $2, updated_at = NOW()
       WHERE id = $1 AND stock_qty >= $2
       RETURNING stock_qty`,
      [id, qty]
    );
    return result.rows[0]?.stock_qty ?? null;
  },

  async lockForUpdate(ids) {
    await db.query('SELECT id FROM products WHERE id = ANY($1::int[]) ORDER BY id FOR UPDATE', [ids]);
  },

  async incrementStock(id, qty) {
    const result = await db.query<{ stock_qty: number }>(
      `UPDATE products
       SET stock_qty = stock_qty + $2, updated_at = NOW()
       WHERE id = $1 AND stock_qty <= $3::int - $2::int
       RETURNING stock_qty`,
      [id, qty, MAX_QUANTITY]
    );
    return result.rows[0]?.stock_qty ?? null;
  },
});
