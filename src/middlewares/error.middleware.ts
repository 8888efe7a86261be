import { Request, Response, NextFunction } from 'express';
import { JsonWebTokenError, TokenExpiredError } from 'jsonwebtoken';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error handlers by their four parameters
  _next: NextFunction
) => {
  logger.error('[Error Handler]', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('user-agent'),
    params: req.params,
    query: req.query,
  });

  if (err instanceof TokenExpiredError) {
    return ResponseHandler.unauthorized(res, 'Token has expired');
  }

  if (err instanceof JsonWebTokenError) {
    return ResponseHandler.unauthorized(res, 'Invalid token');
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    return ResponseHandler.badRequest(res, 'Malformed JSON body');
  }

  return ResponseHandler.fromError(res, err);
};

export const notFoundHandler = (req: Request, res: Response, _next: NextFunction) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
