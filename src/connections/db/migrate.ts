import type { PoolClient } from 'pg';
import { pool } from './connection';
import { migrations } from './migrations';
import { Migration } from './migrations/types';
import { logger } from '../../utils/logging';

const createMigrationsTable = async () => {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

const isMigrationExecuted = async (name: string): Promise<boolean> => {
  const result = await pool.query('SELECT id FROM migrations WHERE name = $1', [name]);
  return result.rows.length > 0;
};

// Applies or reverts one migration and its bookkeeping row in a single transaction
const runInTransaction = async (work: (client: PoolClient) => Promise<void>) => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await work(client);
    await client.query('COMMIT');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
};

const runMigration = async (name: string, migration: Migration) => {
  try {
    await runInTransaction(async (client) => {
      await migration.up(client);
      await client.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
    });
    logger.info(`✓ Migration ${name} executed successfully`);
  } catch (error) {
    logger.error(`✗ Migration ${name} failed`, { error });
    throw error;
  }
};

const rollbackMigration = async (name: string, migration: Migration) => {
  try {
    await runInTransaction(async (client) => {
      await migration.down(client);
      await client.query('DELETE FROM migrations WHERE name = $1', [name]);
    });
    logger.info(`✓ Migration ${name} rolled back successfully`);
  } catch (error) {
    logger.error(`✗ Migration ${name} rollback failed`, { error });
    throw error;
  }
};

export const migrate = async () => {
  try {
    logger.info('Starting database migrations...');
    await createMigrationsTable();
    logger.info(`Found ${migrations.length} migration files`);

    for (const { name, migration } of migrations) {
      if (await isMigrationExecuted(name)) {
        logger.info(`⊘ Migration ${name} already executed, skipping...`);
        continue;
      }
      await runMigration(name, migration);
    }

    logger.info('All migrations completed successfully!');
  } finally {
    await pool.end();
  }
};

export const rollback = async () => {
  try {
    logger.info('Rolling back last migration...');
    await createMigrationsTable();

    const result = await pool.query<{ name: string }>(
      'SELECT name FROM migrations ORDER BY executed_at DESC, id DESC LIMIT 1'
    );

    const last = result.rows[0];
    if (!last) {
      logger.info('No migrations to rollback');
      return;
    }

    const migrationInfo = migrations.find(m => m.name === last.name);
    if (!migrationInfo) {
      logger.error(`Migration ${last.name} not found in migrations list`);
      return;
    }

    await rollbackMigration(last.name, migrationInfo.migration);
    logger.info('Rollback completed successfully!');
  } finally {
    await pool.end();
  }
};

if (require.main === module) {
  const command = process.argv[2];
  const task = command === 'rollback' ? rollback : migrate;

  task().catch((error: unknown) => {
    logger.error('Migration error', { error });
    process.exit(1);
  });
}
