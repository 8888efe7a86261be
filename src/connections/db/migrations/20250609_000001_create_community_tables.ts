import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS community_messages (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        title VARCHAR(255),
        content TEXT NOT NULL,
        category VARCHAR(100),
        tags JSONB NOT NULL DEFAULT '[]'::jsonb,
        is_pinned BOOLEAN NOT NULL DEFAULT FALSE,
        is_announcement BOOLEAN NOT NULL DEFAULT FALSE,
        views_count INTEGER NOT NULL DEFAULT 0,
        likes_count INTEGER NOT NULL DEFAULT 0,
        replies_count INTEGER NOT NULL DEFAULT 0,
        last_reply_at TIMESTAMP,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        deleted_at TIMESTAMP
      )
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS message_attachments (
        id SERIAL PRIMARY KEY,
        community_message_id INTEGER NOT NULL REFERENCES community_messages(id) ON DELETE CASCADE,
        file_name VARCHAR(255) NOT NULL,
        file_path VARCHAR(500) NOT NULL,
        -- image | video | audio | document
        file_type VARCHAR(20) NOT NULL,
        mime_type VARCHAR(100) NOT NULL,
        file_size INTEGER NOT NULL,
        caption VARCHAR(255),
        display_order INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS message_replies (
        id SERIAL PRIMARY KEY,
        community_message_id INTEGER NOT NULL REFERENCES community_messages(id) ON DELETE CASCADE,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        content TEXT NOT NULL,
        parent_reply_id INTEGER REFERENCES message_replies(id) ON DELETE CASCADE,
        likes_count INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        deleted_at TIMESTAMP
      )
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS message_likes (
        id SERIAL PRIMARY KEY,
        community_message_id INTEGER NOT NULL REFERENCES community_messages(id) ON DELETE CASCADE,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (community_message_id, user_id)
      )
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS reply_likes (
        id SERIAL PRIMARY KEY,
        message_reply_id INTEGER NOT NULL REFERENCES message_replies(id) ON DELETE CASCADE,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (message_reply_id, user_id)
      )
    `);

    await client.query('CREATE INDEX IF NOT EXISTS idx_community_messages_pinned_created ON community_messages(is_pinned, created_at DESC)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_community_messages_updated ON community_messages(updated_at)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_message_attachments_message ON message_attachments(community_message_id)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_message_replies_message ON message_replies(community_message_id, parent_reply_id)');
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS reply_likes CASCADE');
    await client.query('DROP TABLE IF EXISTS message_likes CASCADE');
    await client.query('DROP TABLE IF EXISTS message_replies CASCADE');
    await client.query('DROP TABLE IF EXISTS message_attachments CASCADE');
    await client.query('DROP TABLE IF EXISTS community_messages CASCADE');
  },
};
