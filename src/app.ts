import express from 'express';
import { pool } from './connections';
import { appConfig } from './connections/config/app.config';
import routes from './routes';
import { corsMiddleware } from './middlewares/cors.middleware';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import { logger } from './utils/logging';

const app = express();

app.use(corsMiddleware);
app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: true }));

app.get('/health', async (_req, res) => {
  try {
    await pool.query('SELECT 1');
    res.json({ status: 'ok', database: 'connected' });
  } catch (error) {
    logger.error('Health check failed', { error });
    res.status(503).json({ status: 'error', database: 'disconnected' });
  }
});

// stored files are referenced as <folder>/<name> below UPLOAD_DIR
app.use('/uploads', express.static(appConfig.uploadDir));

app.use('/api', routes);

app.use(notFoundHandler);
app.use(errorHandler);

export default app;
