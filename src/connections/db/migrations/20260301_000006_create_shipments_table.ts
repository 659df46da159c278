import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS shipments (
        id SERIAL PRIMARY KEY,
        product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE RESTRICT,
        warehouse_id INTEGER NOT NULL REFERENCES warehouses(id) ON DELETE RESTRICT,
        driver_id INTEGER REFERENCES drivers(id) ON DELETE RESTRICT,
        customer_id INTEGER REFERENCES customers(id) ON DELETE RESTRICT,
        customer_address VARCHAR(255),
        notes TEXT NOT NULL DEFAULT '',
        current_status VARCHAR(20) NOT NULL DEFAULT 'NEW'
          CHECK (current_status IN ('NEW', 'ASSIGNED', 'IN_TRANSIT', 'DELIVERED')),
        assigned_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    await client.query('CREATE INDEX IF NOT EXISTS idx_shipments_driver ON shipments(driver_id)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_shipments_product ON shipments(product_id)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_shipments_current_status ON shipments(current_status)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_shipments_updated_at ON shipments(updated_at DESC)');
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS shipments CASCADE');
  },
};
