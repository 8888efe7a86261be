import type { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      DO $$ BEGIN
        CREATE TYPE consultation_status AS ENUM ('pending', 'accepted', 'declined', 'completed', 'cancelled');
      EXCEPTION
        WHEN duplicate_object THEN null;
      END $$;
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS consultations (
        id SERIAL PRIMARY KEY,
        farmer_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        expert_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        consultation_date TIMESTAMP NOT NULL,
        description TEXT,
        status consultation_status NOT NULL DEFAULT 'pending',
        expert_notes TEXT,
        decline_reason TEXT,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query('CREATE INDEX IF NOT EXISTS idx_consultations_farmer ON consultations(farmer_id)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_consultations_expert ON consultations(expert_id)');
    await client.query('CREATE INDEX IF NOT EXISTS idx_consultations_status ON consultations(status)');
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_consultations_status');
    await client.query('DROP INDEX IF EXISTS idx_consultations_expert');
    await client.query('DROP INDEX IF EXISTS idx_consultations_farmer');
    await client.query('DROP TABLE IF EXISTS consultations CASCADE');
    await client.query('DROP TYPE IF EXISTS consultation_status CASCADE');
  },
};
