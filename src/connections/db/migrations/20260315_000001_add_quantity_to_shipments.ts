import { PoolClient } from 'pg';
import { Migration } from './types';

// Shipments written before this column existed were always single-unit,
// so the default backfills them with 1
export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      ALTER TABLE shipments
      ADD COLUMN IF NOT EXISTS quantity INTEGER NOT NULL DEFAULT 1 CHECK (quantity > 0)
    `);
  },

  async down(client: PoolClient) {
    await client.query('ALTER TABLE shipments DROP COLUMN IF EXISTS quantity');
  },
};
