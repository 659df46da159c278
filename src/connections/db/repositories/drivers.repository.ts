import { ACTIVE_SHIPMENT_STATUSES } from '../../../constants';
import { DriverActivity, DriverProfile } from '../models';
import { Queryable } from './types';

export interface DriverRepository {
  findById(id: number): Promise<DriverProfile | null>;
  setActive(id: number, isActive: boolean): Promise<DriverProfile | null>;
  listActivity(): Promise<DriverActivity[]>;
  findActivity(id: number): Promise<DriverActivity | null>;
}

const PROFILE_SELECT = `
  SELECT d.id, d.user_id, d.is_active, u.username, u.phone
  FROM drivers d
  JOIN users u ON u.id = d.user_id
`;

// Latest status update across the driver's shipments, plus the most recently
// touched shipment still in an active status
const ACTIVITY_SELECT = `
  SELECT d.id, d.user_id, d.is_active, u.username, u.phone,
         latest.status AS last_status,
         latest.timestamp AS last_seen_at,
         (
           SELECT s.id FROM shipments s
           WHERE s.driver_id = d.id AND s.current_status = ANY($1::text[])
           ORDER BY s.updated_at DESC, s.id DESC
           LIMIT 1
         ) AS current_active_shipment_id
  FROM drivers d
  JOIN users u ON u.id = d.user_id
  LEFT JOIN LATERAL (
    SELECT su.status, su.timestamp
    FROM status_updates su
    JOIN shipments s ON s.id = su.shipment_id
    WHERE s.driver_id = d.id
    ORDER BY su.timestamp DESC, su.id DESC
    LIMIT 1
  ) latest ON TRUE
`;

export const createDriverRepository = (db: Queryable): DriverRepository => ({
  async findById(id) {
    const result = await db.query<DriverProfile>(`${PROFILE_SELECT} WHERE d.id = $1`, [id]);
    return result.rows[0] ?? null;
  },

  async setActive(id, isActive) {
    const result = await db.query<DriverProfile>(
      `WITH updated AS (
         UPDATE drivers SET is_active = $2 WHERE id = $1
         RETURNING id, user_id, is_active
       )
       SELECT updated.id, updated.user_id, updated.is_active, u.username, u.phone
       FROM updated
       JOIN users u ON u.id = updated.user_id`,
      [id, isActive]
    );
    return result.rows[0] ?? null;
  },

  async listActivity() {
    const result = await db.query<DriverActivity>(
      `${ACTIVITY_SELECT} ORDER BY u.username, d.id`,
      [ACTIVE_SHIPMENT_STATUSES]
    );
    return result.rows;
  },

  async findActivity(id) {
    const result = await db.query<DriverActivity>(
      `${ACTIVITY_SELECT} WHERE d.id = $2`,
      [ACTIVE_SHIPMENT_STATUSES, id]
    );
    return result.rows[0] ?? null;
  },
});
