import type { PoolClient } from 'pg';
import { pool } from './connection';

/**
 * Run `work` inside BEGIN/COMMIT on a dedicated client.
 * Any thrown error rolls the transaction back and is rethrown.
 */
export const withTransaction = async <T>(work: (client: PoolClient) => Promise<T>): Promise<T> => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
};
