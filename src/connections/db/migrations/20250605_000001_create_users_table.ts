import type { PoolClient } from 'pg';
import bcrypt from 'bcryptjs';
import { Migration } from './types';
import { logger } from '../../../utils/logging';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS users (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        username VARCHAR(255),
        email VARCHAR(255) UNIQUE NOT NULL,
        phone_number VARCHAR(20),
        password_hash VARCHAR(255) NOT NULL,
        image_url VARCHAR(500),
        location VARCHAR(255),
        -- admin | expert | farmer | customer | moderator
        role VARCHAR(20) NOT NULL DEFAULT 'customer',
        favorites JSONB NOT NULL DEFAULT '[]'::jsonb,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query('CREATE INDEX IF NOT EXISTS idx_users_role ON users(role)');

    const existingAdmin = await client.query("SELECT id FROM users WHERE role = 'admin' LIMIT 1");

    if (existingAdmin.rows.length === 0) {
      const email = process.env.ADMIN_EMAIL || 'admin@example.com';
      const password = process.env.ADMIN_PASSWORD || 'changeme123';
      const passwordHash = await bcrypt.hash(password, 10);

      await client.query(
        `INSERT INTO users (name, email, password_hash, role)
         VALUES ($1, $2, $3, 'admin')`,
        ['Administrator', email, passwordHash]
      );

      logger.info('Default admin user created', { email });
      logger.warn('Change the default admin password after first login');
    }
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_users_role');
    await client.query('DROP TABLE IF EXISTS users CASCADE');
  },
};
