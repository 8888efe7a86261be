import { Response, NextFunction } from 'express';
import { AuthRequest } from '../types/request.types';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

/**
 * Fixed-window counters kept in process memory
 */
export class RateLimitStore {
  private entries = new Map<string, RateLimitEntry>();

  hit(key: string, windowMs: number, now: number = Date.now()): RateLimitEntry {
    let entry = this.entries.get(key);
    if (!entry || entry.resetTime <= now) {
      entry = { count: 0, resetTime: now + windowMs };
      this.entries.set(key, entry);
    }
    entry.count++;
    return entry;
  }

  prune(now: number = Date.now()) {
    for (const [key, entry] of this.entries) {
      if (entry.resetTime <= now) {
        this.entries.delete(key);
      }
    }
  }

  clear() {
    this.entries.clear();
  }
}

export const rateLimitStore = new RateLimitStore();

// unref so the timer never keeps the process (or a test run) alive
setInterval(() => rateLimitStore.prune(), 60000).unref();

const getClientId = (req: AuthRequest): string => {
  return req.user?.id?.toString() || req.ip || 'unknown';
};

export const rateLimit = (
  windowMs: number = 15 * 60 * 1000,
  maxRequests: number = 5,
  message?: string,
  store: RateLimitStore = rateLimitStore
) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    const clientId = getClientId(req);
    const now = Date.now();
    const entry = store.hit(`${req.path}:${clientId}`, windowMs, now);

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', Math.max(0, maxRequests - entry.count).toString());
    res.setHeader('X-RateLimit-Reset', new Date(entry.resetTime).toISOString());

    if (entry.count > maxRequests) {
      const retryAfter = Math.ceil((entry.resetTime - now) / 1000);

      logger.warn('[Rate Limit Exceeded]', {
        clientId,
        path: req.path,
        count: entry.count,
        limit: maxRequests,
      });

      res.setHeader('Retry-After', retryAfter.toString());
      return ResponseHandler.tooManyRequests(
        res,
        message || `Too many requests. Try again in ${retryAfter} seconds.`,
        retryAfter
      );
    }

    next();
  };
};

export const rateLimiters = {
  // login / register: 10 per 15 minutes
  auth: rateLimit(15 * 60 * 1000, 10, 'Too many attempts. Please try again in 15 minutes.'),

  // community posts, replies and comments
  posting: rateLimit(60 * 1000, 30, 'You are posting too fast. Please slow down.'),

  // reset codes: 3 per minute
  passwordReset: rateLimit(60 * 1000, 3, 'Too many reset requests. Please wait a minute.'),
};
