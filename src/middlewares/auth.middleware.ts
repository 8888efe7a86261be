import { Response, NextFunction } from 'express';
import { pool } from '../connections';
import { AuthRequest, AuthUser } from '../types/request.types';
import type { UserRole } from '../constants';
import { ResponseHandler } from '../utils/response';
import { HttpError } from '../utils/errors';
import { decodeAccessToken, isTokenRevoked } from '../utils/token';
import { logger } from '../utils/logging';

const extractBearerToken = (req: AuthRequest): string | undefined => {
  const [scheme, token] = (req.headers.authorization ?? '').split(' ');
  return scheme?.toLowerCase() === 'bearer' && token ? token : undefined;
};

export const resolveUserFromToken = async (token: string): Promise<AuthUser> => {
  const decoded = decodeAccessToken(token);

  if (await isTokenRevoked(decoded.jti)) {
    throw HttpError.unauthorized('Token has been revoked');
  }

  const result = await pool.query<{ id: number; email: string; name: string; role: UserRole }>(
    'SELECT id, email, name, role FROM users WHERE id = $1',
    [decoded.userId]
  );

  const user = result.rows[0];
  if (!user) {
    throw HttpError.unauthorized('User no longer exists');
  }

  return {
    id: user.id,
    email: user.email,
    name: user.name,
    role: user.role,
    tokenId: decoded.jti,
    tokenExpiresAt: decoded.exp,
  };
};

export const authenticate = async (req: AuthRequest, res: Response, next: NextFunction) => {
  const token = extractBearerToken(req);

  if (!token) {
    return ResponseHandler.unauthorized(res, 'Unauthenticated');
  }

  try {
    req.user = await resolveUserFromToken(token);
  } catch (error) {
    logger.warn('Rejected bearer token', {
      path: req.originalUrl,
      reason: error instanceof Error ? error.message : String(error),
    });
    return ResponseHandler.unauthorized(res, error instanceof HttpError ? error.message : 'Invalid token');
  }

  next();
};

// Sets req.user when a valid token is sent, otherwise continues as a guest
export const optionalAuthenticate = async (req: AuthRequest, _res: Response, next: NextFunction) => {
  const token = extractBearerToken(req);

  if (token) {
    try {
      req.user = await resolveUserFromToken(token);
    } catch (error) {
      logger.debug('Ignoring invalid token on public route', {
        path: req.originalUrl,
        reason: error instanceof Error ? error.message : String(error),
      });
      req.user = undefined;
    }
  }

  next();
};

export const requireRole = (...roles: UserRole[]) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.user) {
      return ResponseHandler.unauthorized(res, 'Unauthenticated');
    }

    if (!roles.includes(req.user.role)) {
      return ResponseHandler.forbidden(res, 'You do not have permission to perform this action');
    }

    next();
  };
};

/**
 * The authenticated user, for handlers mounted behind `authenticate`.
 */
export const requireAuthUser = (req: AuthRequest): AuthUser => {
  if (!req.user) {
    throw HttpError.unauthorized();
  }
  return req.user;
};
