import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS status_updates (
        id SERIAL PRIMARY KEY,
        shipment_id INTEGER NOT NULL REFERENCES shipments(id) ON DELETE CASCADE,
        status VARCHAR(20) NOT NULL
          CHECK (status IN ('NEW', 'ASSIGNED', 'IN_TRANSIT', 'DELIVERED')),
        timestamp TIMESTAMPTZ NOT NULL DEFAULT clock_timestamp(),
        note TEXT NOT NULL DEFAULT '',
        photo_url VARCHAR(500),
        latitude NUMERIC(9, 6),
        longitude NUMERIC(9, 6),
        location_accuracy_m INTEGER CHECK (location_accuracy_m >= 0)
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_status_updates_shipment_latest
      ON status_updates(shipment_id, timestamp DESC, id DESC)
    `);
    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_status_updates_status_timestamp
      ON status_updates(status, timestamp)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS status_updates CASCADE');
  },
};
