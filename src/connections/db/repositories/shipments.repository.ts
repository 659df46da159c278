import { ShipmentStatus } from '../../../constants';
import { CreateShipmentRow, Shipment, ShipmentSummary, UpdateShipmentRow } from '../models';
import { Queryable, SearchTerm, containsPattern } from './types';

export interface ShipmentListOptions {
  updatedSince?: Date;
  limit: number;
}

export interface ShipmentRepository {
  findById(id: number): Promise<Shipment | null>;
  /** Row-locks the shipment for the rest of the transaction */
  findByIdForUpdate(id: number): Promise<Shipment | null>;
  findSummary(id: number): Promise<ShipmentSummary | null>;
  list(options: ShipmentListOptions): Promise<ShipmentSummary[]>;
  listByDriver(driverId: number): Promise<ShipmentSummary[]>;
  /**
   * An all-digit term matches the id; any other term matches the product
   * name or notes. Most recently updated first.
   */
  search(term: SearchTerm | null, limit: number): Promise<ShipmentSummary[]>;
  countByProduct(productId: number): Promise<number>;
  countByWarehouse(warehouseId: number): Promise<number>;
  countByCustomer(customerId: number): Promise<number>;
  create(row: CreateShipmentRow): Promise<Shipment>;
  update(id: number, row: UpdateShipmentRow): Promise<Shipment>;
  /** Targeted write of the derived status; leaves every other column alone */
  updateStatus(id: number, status: ShipmentStatus): Promise<void>;
  delete(id: number): Promise<boolean>;
}

const SHIPMENT_COLUMNS = `id, product_id, warehouse_id, driver_id, customer_id, customer_address, notes,
  quantity, current_status, assigned_at, created_at, updated_at`;

const SUMMARY_SELECT = `
  SELECT s.id, s.product_id, s.warehouse_id, s.driver_id, s.customer_id, s.customer_address, s.notes,
         s.quantity, s.current_status, s.assigned_at, s.created_at, s.updated_at,
         p.name AS product_name,
         c.name AS customer_name,
         u.username AS driver_username
  FROM shipments s
  JOIN products p ON p.id = s.product_id
  LEFT JOIN customers c ON c.id = s.customer_id
  LEFT JOIN drivers d ON d.id = s.driver_id
  LEFT JOIN users u ON u.id = d.user_id
`;

const countWhere = async (
  db: Queryable,
  column: 'product_id' | 'warehouse_id' | 'customer_id',
  id: number
): Promise<number> => {
  const result = await db.query<{ count: number }>(
    `SELECT COUNT(*)::int AS count FROM shipments WHERE ${column} = $1`,
    [id]
  );
  return result.rows[0]?.count ?? 0;
};

export const createShipmentRepository = (db: Queryable): ShipmentRepository => ({
  async findById(id) {
    const result = await db.query<Shipment>(`SELECT ${SHIPMENT_COLUMNS} FROM shipments WHERE id = $1`, [id]);
    return result.rows[0] ?? null;
  },

  async findByIdForUpdate(id) {
    const result = await db.query<Shipment>(
      `SELECT ${SHIPMENT_COLUMNS} FROM shipments WHERE id = $1 FOR UPDATE`,
      [id]
    );
    return result.rows[0] ?? null;
  },

  async findSummary(id) {
    const result = await db.query<ShipmentSummary>(`${SUMMARY_SELECT} WHERE s.id = $1`, [id]);
    return result.rows[0] ?? null;
  },

  async list({ updatedSince, limit }) {
    const params: unknown[] = [];
    let query = SUMMARY_SELECT;

    if (updatedSince) {
      params.push(updatedSince);
      query += ` WHERE s.updated_at >= $${params.length}`;
    }

    params.push(limit);
    query += ` ORDER BY s.updated_at DESC, s.id DESC LIMIT $${params.length}`;

    const result = await db.query<ShipmentSummary>(query, params);
    return result.rows;
  },

  async listByDriver(driverId) {
    const result = await db.query<ShipmentSummary>(
      `${SUMMARY_SELECT} WHERE s.driver_id = $1 ORDER BY s.assigned_at DESC, s.id DESC`,
      [driverId]
    );
    return result.rows;
  },

  async search(term, limit) {
    if (term?.digits && term.id === null) {
      return [];
    }

    const params: unknown[] = [];
    let query = SUMMARY_SELECT;

    if (term?.digits) {
      params.push(term.id);
      query += ' WHERE s.id = $1';
    } else if (term) {
      params.push(containsPattern(term.text));
      query += ' WHERE p.name ILIKE $1 OR s.notes ILIKE $1';
    }

    params.push(limit);
    query += ` ORDER BY s.updated_at DESC, s.id DESC LIMIT $${params.length}`;

    const result = await db.query<ShipmentSummary>(query, params);
    return result.rows;
  },

  async countByProduct(productId) {
    return countWhere(db, 'product_id', productId);
  },

  async countByWarehouse(warehouseId) {
    return countWhere(db, 'warehouse_id', warehouseId);
  },

  async countByCustomer(customerId) {
    return countWhere(db, 'customer_id', customerId);
  },

  async create(row) {
    const result = await db.query<Shipment>(
      `INSERT INTO shipments (product_id, warehouse_id, driver_id, customer_id, customer_address, notes, quantity)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${SHIPMENT_COLUMNS}`,
      [row.product_id, row.warehouse_id, row.driver_id, row.customer_id, row.customer_address, row.notes, row.quantity]
    );
    return result.rows[0];
  },

  async update(id, row) {
    const result = await db.query<Shipment>(
      `UPDATE shipments
       SET product_id = $2, warehouse_id = $3, driver_id = $4, customer_id = $5,
           customer_address = $6, notes = $7, quantity = $8,
           assigned_at = CASE WHEN $9 THEN NOW() ELSE assigned_at END, updated_at = NOW()
       WHERE id = $1
       RETURNING ${SHIPMENT_COLUMNS}`,
      [
        id,
        row.product_id,
        row.warehouse_id,
        row.driver_id,
        row.customer_id,
        row.customer_address,
        row.notes,
        row.quantity,
        row.reassigned,
      ]
    );
    return result.rows[0];
  },

  async updateStatus(id, status) {
    await db.query(
      'UPDATE shipments SET current_status = $2, updated_at = NOW() WHERE id = $1',
      [id, status]
    );
  },

  async delete(id) {
    const result = await db.query('DELETE FROM shipments WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  },
});
