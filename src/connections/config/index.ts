export { appConfig, emailConfig } from './app.config';
export { dbConfig } from './database.config';
export { redisConfig } from './redis.config';
