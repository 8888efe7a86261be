import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS success_stories (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        title VARCHAR(255) NOT NULL,
        content TEXT NOT NULL,
        location VARCHAR(255),
        crop_type VARCHAR(255),
        yield_improvement DECIMAL(10, 2),
        yield_unit VARCHAR(50),
        is_featured BOOLEAN NOT NULL DEFAULT FALSE,
        views_count INTEGER NOT NULL DEFAULT 0,
        likes_count INTEGER NOT NULL DEFAULT 0,
        comments_count INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        deleted_at TIMESTAMP
      )
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS story_images (
        id SERIAL PRIMARY KEY,
        success_story_id INTEGER NOT NULL REFERENCES success_stories(id) ON DELETE CASCADE,
        image_path VARCHAR(500) NOT NULL,
        caption VARCHAR(255),
        display_order INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS story_comments (
        id SERIAL PRIMARY KEY,
        success_story_id INTEGER NOT NULL REFERENCES success_stories(id) ON DELETE CASCADE,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        comment TEXT NOT NULL,
        parent_id INTEGER REFERENCES story_comments(id) ON DELETE CASCADE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        deleted_at TIMESTAMP
      )
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS story_likes (
        id SERIAL PRIMARY KEY,
        success_story_id INTEGER NOT NULL REFERENCES success_stories(id) ON DELETE CASCADE,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (success_story_id, user_id)
      )
    `);

    await client.query('CREATE INDEX IF NOT EXISTS idx_success_stories_featured_created ON success_stories(is_featured, created_at DESC)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_story_images_story ON story_images(success_story_id, display_order)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_story_comments_story ON story_comments(success_story_id, parent_id)');
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS story_likes CASCADE');
    await client.query('DROP TABLE IF EXISTS story_comments CASCADE');
    await client.query('DROP TABLE IF EXISTS story_images CASCADE');
    await client.query('DROP TABLE IF EXISTS success_stories CASCADE');
  },
};
