import type { Request } from 'express';
import type { UserRole } from '../constants';

export interface AuthUser {
  id: number;
  email: string;
  name: string;
  role: UserRole;
  // jti / exp of the presented token, needed to revoke it on logout
  tokenId: string;
  tokenExpiresAt: number;
}

/**
 * Request populated by the authenticate middlewares
 */
export interface AuthRequest extends Request {
  user?: AuthUser;
}
