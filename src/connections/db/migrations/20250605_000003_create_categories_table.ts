import type { PoolClient } from 'pg';
import { Migration } from './types';
import seedCategories from '../seeds/categories.json';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS categories (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        description TEXT,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    const existing = await client.query('SELECT COUNT(*)::int AS count FROM categories');
    if (existing.rows[0].count > 0) {
      return;
    }

    for (const category of seedCategories) {
      await client.query(
        'INSERT INTO categories (name, description) VALUES ($1, $2)',
        [category.name, category.description]
      );
    }
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS categories CASCADE');
  },
};
