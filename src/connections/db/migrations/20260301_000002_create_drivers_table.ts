import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS drivers (
        id SERIAL PRIMARY KEY,
        user_id INTEGER UNIQUE NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        is_active BOOLEAN NOT NULL DEFAULT TRUE
      )
    `);

    await client.query('CREATE INDEX IF NOT EXISTS idx_drivers_is_active ON drivers(is_active)');
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_drivers_is_active');
    await client.query('DROP TABLE IF EXISTS drivers CASCADE');
  },
};
