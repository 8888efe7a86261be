import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS products (
        id SERIAL PRIMARY KEY,
        -- Seller who posted the product
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        category_id INTEGER NOT NULL REFERENCES categories(id) ON DELETE CASCADE,
        name VARCHAR(255) NOT NULL,
        description TEXT NOT NULL,
        -- Relative path under the upload directory (productImages/...)
        image VARCHAR(500) NOT NULL,
        price DECIMAL(10, 2) NOT NULL,
        stock INTEGER NOT NULL DEFAULT 0 CHECK (stock >= 0),
        location VARCHAR(255),
        is_featured BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query('CREATE INDEX IF NOT EXISTS idx_products_category ON products(category_id)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_products_user ON products(user_id)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_products_featured ON products(is_featured) WHERE is_featured = TRUE');
    await client.query('CREATE INDEX IF NOT EXISTS idx_products_created_at ON products(created_at DESC)');
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_products_created_at');
    await client.query('DROP INDEX IF EXISTS idx_products_featured');
    await client.query('DROP INDEX IF EXISTS idx_products_user');
    await client.query('DROP INDEX IF EXISTS idx_products_category');
    await client.query('DROP TABLE IF EXISTS products CASCADE');
  },
};
