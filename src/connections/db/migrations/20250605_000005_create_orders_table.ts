import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS orders (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        total_amount DECIMAL(10, 2) NOT NULL,
        -- pending | processing | completed | cancelled
        status VARCHAR(20) NOT NULL DEFAULT 'pending',
        shipping_address TEXT NOT NULL,
        phone_number VARCHAR(20) NOT NULL,
        notes TEXT,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query('CREATE INDEX IF NOT EXISTS idx_orders_user ON orders(user_id)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_orders_status ON orders(status)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_orders_created_at ON orders(created_at DESC)');
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_orders_created_at');
    await client.query('DROP INDEX IF EXISTS idx_orders_status');
    await client.query('DROP INDEX IF EXISTS idx_orders_user');
    await client.query('DROP TABLE IF EXISTS orders CASCADE');
  },
};
