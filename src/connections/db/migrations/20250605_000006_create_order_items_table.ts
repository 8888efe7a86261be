import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS order_items (
        id SERIAL PRIMARY KEY,
        order_id INTEGER NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
        product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
        quantity INTEGER NOT NULL CHECK (quantity > 0),
        unit_price DECIMAL(10, 2) NOT NULL,
        total_price DECIMAL(10, 2) NOT NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'pending',
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query('CREATE INDEX IF NOT EXISTS idx_order_items_order ON order_items(order_id)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_order_items_product ON order_items(product_id)');
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_order_items_product');
    await client.query('DROP INDEX IF EXISTS idx_order_items_order');
    await client.query('DROP TABLE IF EXISTS order_items CASCADE');
  },
};
