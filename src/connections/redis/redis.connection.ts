import { createClient } from 'redis';
import { redisConfig } from '../config/redis.config';
import { logger } from '../../utils/logging';

const client = createClient({
  socket: {
    host: redisConfig.host,
    port: redisConfig.port,
  },
  ...(redisConfig.password && { password: redisConfig.password }),
  database: redisConfig.db,
});

client.on('error', (err: Error) => {
  logger.error('Redis Client Error', { error: err.message, stack: err.stack });
});

/**
 * Connect to Redis. Revoked access tokens live here until they expire.
 */
export const connectRedis = async (): Promise<void> => {
  if (client.isOpen) {
    logger.info('Redis already connected');
    return;
  }

  try {
    await client.connect();
    logger.info('Redis connected successfully');
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.error('Failed to connect to Redis:', { error: error.message, stack: error.stack });
    throw error;
  }
};

export const redisClient = client;
