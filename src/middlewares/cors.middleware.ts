import cors from 'cors';
import type { CorsOptions } from 'cors';
import { appConfig } from '../connections/config/app.config';
import { logger } from '../utils/logging';

const DEV_ORIGINS = ['http://localhost:3000', 'http://localhost:5173'];

/**
 * FRONTEND_URL plus CORS_ORIGINS; development also accepts the usual local dev servers
 */
const allowedOrigins = (): Set<string> => {
  const origins = new Set<string>(appConfig.corsOrigins);
  if (appConfig.frontendUrl) {
    origins.add(appConfig.frontendUrl);
  }
  if (appConfig.nodeEnv === 'development') {
    DEV_ORIGINS.forEach((origin) => origins.add(origin));
  }
  return origins;
};

const origins = allowedOrigins();

export const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // curl, mobile clients and same-origin requests send no Origin header
    if (!origin || origins.has(origin)) {
      return callback(null, true);
    }
    if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      return callback(null, true);
    }
    logger.warn('Rejected CORS origin', { origin });
    callback(new Error('Not allowed by CORS'));
  },
  credentials: true,
  // PATCH carries profile, order status and consultation actions
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'Accept'],
  exposedHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset', 'Retry-After'],
  maxAge: 86400,
};

export const corsMiddleware = cors(corsOptions);
