import { CreateWarehouseInput, UpdateWarehouseInput, Warehouse } from '../models';
import { Queryable } from './types';

export interface WarehouseRepository {
  list(): Promise<Warehouse[]>;
  findById(id: number): Promise<Warehouse | null>;
  /** Case-insensitive match; `excludeId` skips the row being renamed */
  findByNameAndLocation(name: string, location: string, excludeId?: number): Promise<Warehouse | null>;
  create(input: CreateWarehouseInput): Promise<Warehouse>;
  update(id: number, input: UpdateWarehouseInput): Promise<Warehouse | null>;
  delete(id: number): Promise<boolean>;
}

const WAREHOUSE_COLUMNS = 'id, name, location, created_at, updated_at';

export const createWarehouseRepository = (db: Queryable): WarehouseRepository => ({
  async list() {
    const result = await db.query<Warehouse>(`SELECT ${WAREHOUSE_COLUMNS} FROM warehouses ORDER BY name, id`);
    return result.rows;
  },

  async findById(id) {
    const result = await db.query<Warehouse>(`SELECT ${WAREHOUSE_COLUMNS} FROM warehouses WHERE id = $1`, [id]);
    return result.rows[0] ?? null;
  },

  async findByNameAndLocation(name, location, excludeId) {
    const result = await db.query<Warehouse>(
      `SELECT ${WAREHOUSE_COLUMNS} FROM warehouses
       WHERE LOWER(name) = LOWER($1) AND LOWER(location) = LOWER($2)
         AND ($3::int IS NULL OR id <> $3::int)`,
      [name, location, excludeId ?? null]
    );
    return result.rows[0] ?? null;
  },

  async create(input) {
    const result = await db.query<Warehouse>(
      `INSERT INTO warehouses (name, location) VALUES ($1, $2) RETURNING ${WAREHOUSE_COLUMNS}`,
      [input.name, input.location]
    );
    return result.rows[0];
  },

  async update(id, input) {
    const result = await db.query<Warehouse>(
      `UPDATE warehouses
       SET name = COALESCE($2, name), location = COALESCE($3, location), updated_at = NOW()
       WHERE id = $1
       RETURNING ${WAREHOUSE_COLUMNS}`,
      [id, input.name ?? null, input.location ?? null]
    );
    return result.rows[0] ?? null;
  },

  async delete(id) {
    const result = await db.query('DELETE FROM warehouses WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  },
});
