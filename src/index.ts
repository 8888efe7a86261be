import app from './app';
import { appConfig } from './connections/config/app.config';
import { connectDatabase, connectRedis } from './connections';
import { logger } from './utils/logging';

const PORT = appConfig.port;

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  logger.info('Initializing connections...');

  logger.info('Connecting to database...');
  await connectDatabase();

  // logout denylist
  logger.info('Connecting to Redis...');
  await connectRedis();

  app.listen(PORT, () => {
    logger.info(`Server is running on port ${PORT}`);
    logger.info(`Environment: ${appConfig.nodeEnv}`);
  });
};

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
