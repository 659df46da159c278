import { CreateStatusUpdateRow, StatusUpdate } from '../models';
import { Queryable } from './types';

export interface StatusUpdateRepository {
  findById(id: number): Promise<StatusUpdate | null>;
  /** Latest entry by (timestamp DESC, id DESC) */
  findLatestForShipment(shipmentId: number): Promise<StatusUpdate | null>;
  listForShipment(shipmentId: number): Promise<StatusUpdate[]>;
  create(row: CreateStatusUpdateRow): Promise<StatusUpdate>;
  delete(id: number): Promise<boolean>;
}

const STATUS_UPDATE_COLUMNS = `id, shipment_id, status, timestamp, note, photo_url,
  latitude, longitude, location_accuracy_m`;

export const createStatusUpdateRepository = (db: Queryable): StatusUpdateRepository => ({
  async findById(id) {
    const result = await db.query<StatusUpdate>(
      `SELECT ${STATUS_UPDATE_COLUMNS} FROM status_updates WHERE id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  },

  async findLatestForShipment(shipmentId) {
    const result = await db.query<StatusUpdate>(
      `SELECT ${STATUS_UPDATE_COLUMNS} FROM status_updates
       WHERE shipment_id = $1
       ORDER BY timestamp DESC, id DESC
       LIMIT 1`,
      [shipmentId]
    );
    return result.rows[0] ?? null;
  },

  async listForShipment(shipmentId) {
    const result = await db.query<StatusUpdate>(
      `SELECT ${STATUS_UPDATE_COLUMNS} FROM status_updates
       WHERE shipment_id = $1
       ORDER BY timestamp DESC, id DESC`,
      [shipmentId]
    );
    return result.rows;
  },

  async create(row) {
    // clock_timestamp() keeps entries written inside one transaction in creation order
    const result = await db.query<StatusUpdate>(
      `INSERT INTO status_updates (shipment_id, status, timestamp, note, photo_url, latitude, longitude, location_accuracy_m)
       VALUES ($1, $2, clock_timestamp(), $3, $4, $5, $6, $7)
       RETURNING ${STATUS_UPDATE_COLUMNS}`,
      [
        row.shipment_id,
        row.status,
        row.note,
        row.photo_url,
        row.latitude,
        row.longitude,
        row.location_accuracy_m,
      ]
    );
    return result.rows[0];
  },

  async delete(id) {
    const result = await db.query('DELETE FROM status_updates WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  },
});
