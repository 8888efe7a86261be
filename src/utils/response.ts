import { Response } from 'express';
import { MulterError } from 'multer';
import { DatabaseError } from 'pg';
import { ZodError } from 'zod';
import { HttpError } from './errors';
import { logger } from './logging';

export type ValidationDetails = Record<string, string[] | undefined>;

/**
 * Response envelope shared by every endpoint
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: {
    code?: string;
    details?: unknown;
  };
  pagination?: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
  };
  meta?: Record<string, unknown>;
}

export class ResponseHandler {
  static success<T>(
    res: Response,
    data?: T,
    message: string = 'Success',
    statusCode: number = 200,
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse<T> = {
      success: true,
      message,
      data,
      ...(meta && { meta }),
    };

    return res.status(statusCode).json(response);
  }

  static created<T>(
    res: Response,
    data?: T,
    message: string = 'Created successfully',
    meta?: Record<string, unknown>
  ): Response {
    return this.success(res, data, message, 201, meta);
  }

  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: {
      code?: string;
      details?: unknown;
    },
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
      ...(meta && { meta }),
    };

    const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`[API Error] ${message}`, { statusCode, code: error?.code });

    return res.status(statusCode).json(response);
  }

  static badRequest(res: Response, message: string = 'Bad request', details?: unknown): Response {
    return this.error(res, message, 400, { code: 'BAD_REQUEST', details });
  }

  /**
   * Validation Error Response (422), details map each field to its messages
   */
  static validationError(
    res: Response,
    details: ValidationDetails,
    message: string = 'The given data was invalid'
  ): Response {
    return this.error(res, message, 422, { code: 'VALIDATION_ERROR', details });
  }

  static unauthorized(res: Response, message: string = 'Unauthenticated'): Response {
    return this.error(res, message, 401, { code: 'UNAUTHORIZED' });
  }

  static forbidden(res: Response, message: string = 'Forbidden'): Response {
    return this.error(res, message, 403, { code: 'FORBIDDEN' });
  }

  static notFound(res: Response, message: string = 'Not found'): Response {
    return this.error(res, message, 404, { code: 'NOT_FOUND' });
  }

  static conflict(res: Response, message: string = 'Resource already exists', details?: unknown): Response {
    return this.error(res, message, 409, { code: 'CONFLICT', details });
  }

  static tooManyRequests(res: Response, message: string = 'Too many requests', retryAfter?: number): Response {
    return this.error(res, message, 429, {
      code: 'TOO_MANY_REQUESTS',
      details: retryAfter ? { retryAfter } : undefined,
    });
  }

  /**
   * Internal Server Error Response. The cause is logged, never sent.
   */
  static internalError(res: Response, message: string = 'Internal server error', error?: unknown): Response {
    logger.error('[Internal Server Error]', {
      message,
      error: error instanceof Error ? error.stack : error,
    });

    return this.error(res, message, 500, { code: 'INTERNAL_ERROR' });
  }

  static paginated<T>(
    res: Response,
    data: T[],
    pagination: {
      page: number;
      limit: number;
      total: number;
    },
    message: string = 'Success',
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse<T[]> = {
      success: true,
      message,
      data,
      pagination: {
        ...pagination,
        totalPages: Math.ceil(pagination.total / pagination.limit),
      },
      ...(meta && { meta }),
    };

    return res.status(200).json(response);
  }

  /**
   * Maps a thrown value to its response: schema failures and multer limits
   * become 422, HttpError keeps its status, unique and foreign-key
   * violations become 409 and 422, anything else a generic 500.
   */
  static fromError(res: Response, error: unknown, fallbackMessage: string = 'Internal server error'): Response {
    if (error instanceof ZodError) {
      return this.validationError(res, error.flatten().fieldErrors);
    }

    if (error instanceof HttpError) {
      return this.error(res, error.message, error.statusCode, {
        code: error.code,
        details: error.details,
      });
    }

    if (error instanceof MulterError) {
      const field = error.field ?? 'file';
      return this.validationError(res, { [field]: [error.message] });
    }

    if (error instanceof DatabaseError) {
      if (error.code === '23505') {
        return this.conflict(res, 'Resource already exists');
      }
      if (error.code === '23503') {
        return this.error(res, 'Referenced resource does not exist', 422, {
          code: 'FOREIGN_KEY_VIOLATION',
        });
      }
    }

    return this.internalError(res, fallbackMessage, error);
  }
}
