// Database
export { pool, connectDatabase, withTransaction } from './db';

// Redis
export { redisClient, connectRedis } from './redis';

// Config - All configurations in one place
export {
  appConfig,
  emailConfig,
  dbConfig,
  redisConfig,
} from './config';
