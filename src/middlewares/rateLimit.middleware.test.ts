import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimitStore, rateLimit } from './rateLimit.middleware';
import { mockNext, mockRequest, mockResponse } from '../test/mocks/mockExpress';

describe('RateLimitStore', () => {
  it('counts hits inside the window and restarts after it', () => {
    const store = new RateLimitStore();

    expect(store.hit('k', 1000, 0).count).toBe(1);
    expect(store.hit('k', 1000, 500).count).toBe(2);

    const fresh = store.hit('k', 1000, 1000);
    expect(fresh.count).toBe(1);
    expect(fresh.resetTime).toBe(2000);
  });

  it('prunes expired windows', () => {
    const store = new RateLimitStore();
    store.hit('a', 100, 0);
    store.hit('b', 1000, 0);

    store.prune(500);

    expect(store.hit('a', 100, 500).count).toBe(1);
    expect(store.hit('b', 1000, 500).count).toBe(2);
  });
});

describe('rateLimit', () => {
  let store: RateLimitStore;

  beforeEach(() => {
    store = new RateLimitStore();
  });

  it('sets the limit headers and passes requests under the limit', () => {
    const limiter = rateLimit(60000, 2, undefined, store);
    const { res, headers } = mockResponse();
    const next = mockNext();

    limiter(mockRequest({ path: '/login', ip: '10.0.0.1' }), res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(headers['x-ratelimit-limit']).toBe('2');
    expect(headers['x-ratelimit-remaining']).toBe('1');
  });

  it('answers 429 with Retry-After once the limit is passed', () => {
    const limiter = rateLimit(60000, 2, 'Too many attempts.', store);
    const next = mockNext();

    limiter(mockRequest({ path: '/login', ip: '10.0.0.1' }), mockResponse().res, next);
    limiter(mockRequest({ path: '/login', ip: '10.0.0.1' }), mockResponse().res, next);
    const { res, statusCode, body, headers } = mockResponse();
    limiter(mockRequest({ path: '/login', ip: '10.0.0.1' }), res, next);

    expect(next).toHaveBeenCalledTimes(2);
    expect(statusCode()).toBe(429);
    expect(headers['x-ratelimit-remaining']).toBe('0');
    expect(headers['retry-after']).toBe('60');
    expect(body()).toEqual({
      success: false,
      message: 'Too many attempts.',
      error: { code: 'TOO_MANY_REQUESTS', details: { retryAfter: 60 } },
    });
  });

  it('keeps separate windows per client', () => {
    const limiter = rateLimit(60000, 1, undefined, store);
    const next = mockNext();

    limiter(mockRequest({ path: '/login', ip: '10.0.0.1' }), mockResponse().res, next);
    limiter(mockRequest({ path: '/login', ip: '10.0.0.2' }), mockResponse().res, next);

    expect(next).toHaveBeenCalledTimes(2);
  });
});
