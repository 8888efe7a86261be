import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS tips (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        category_id INTEGER NOT NULL REFERENCES tip_categories(id) ON DELETE CASCADE,
        title VARCHAR(255) NOT NULL,
        slug VARCHAR(300) NOT NULL UNIQUE,
        content TEXT NOT NULL,
        tags JSONB NOT NULL DEFAULT '[]'::jsonb,
        is_featured BOOLEAN NOT NULL DEFAULT FALSE,
        views_count INTEGER NOT NULL DEFAULT 0,
        likes_count INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        deleted_at TIMESTAMP
      )
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS tip_likes (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        tip_id INTEGER NOT NULL REFERENCES tips(id) ON DELETE CASCADE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (user_id, tip_id)
      )
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS saved_tips (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        tip_id INTEGER NOT NULL REFERENCES tips(id) ON DELETE CASCADE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (user_id, tip_id)
      )
    `);

    await client.query('CREATE INDEX IF NOT EXISTS idx_tips_category ON tips(category_id)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_tips_user ON tips(user_id)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_tips_featured_created ON tips(is_featured, created_at DESC)');
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS saved_tips CASCADE');
    await client.query('DROP TABLE IF EXISTS tip_likes CASCADE');
    await client.query('DROP TABLE IF EXISTS tips CASCADE');
  },
};
