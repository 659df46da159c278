import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS customers (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        phone VARCHAR(20) NOT NULL,
        address VARCHAR(255) NOT NULL DEFAULT '',
        address2 VARCHAR(255) NOT NULL DEFAULT '',
        address3 VARCHAR(255) NOT NULL DEFAULT '',
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    await client.query('CREATE INDEX IF NOT EXISTS idx_customers_name ON customers(name)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_customers_phone ON customers(phone)');
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_customers_phone');
    await client.query('DROP INDEX IF EXISTS idx_customers_name');
    await client.query('DROP TABLE IF EXISTS customers CASCADE');
  },
};
