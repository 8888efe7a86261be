import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fakeDb } from '../test/mocks/fakeDb';
import { mockNext, mockRequest, mockResponse } from '../test/mocks/mockExpress';

const tokens = vi.hoisted(() => ({
  decodeAccessToken: vi.fn(),
  isTokenRevoked: vi.fn(async (_jti: string) => false),
}));

vi.mock('../connections', async () => (await import('../test/mocks/fakeDb')).connectionsMock());
vi.mock('../utils/token', () => tokens);

import { authenticate, optionalAuthenticate, requireAuthUser, requireRole } from './auth.middleware';

const farmerRow = { id: 5, email: 'farmer@example.com', name: 'Test Farmer', role: 'farmer' };

describe('authenticate', () => {
  beforeEach(() => {
    fakeDb.reset();
    tokens.decodeAccessToken.mockReset();
    tokens.isTokenRevoked.mockReset();
    tokens.isTokenRevoked.mockResolvedValue(false);
  });

  it('rejects requests without a bearer token', async () => {
    const { res, statusCode, body } = mockResponse();
    const next = mockNext();

    await authenticate(mockRequest(), res, next);

    expect(statusCode()).toBe(401);
    expect(body()).toEqual({ success: false, message: 'Unauthenticated', error: { code: 'UNAUTHORIZED' } });
    expect(next).not.toHaveBeenCalled();
  });

  it('loads the user behind a valid token', async () => {
    tokens.decodeAccessToken.mockReturnValue({ userId: 5, role: 'farmer', jti: 'jti-1', exp: 2000000000 });
    fakeDb.respond('FROM users', [farmerRow]);
    const req = mockRequest({ headers: { Authorization: 'Bearer good-token' } });
    const next = mockNext();

    await authenticate(req, mockResponse().res, next);

    expect(tokens.decodeAccessToken).toHaveBeenCalledWith('good-token');
    expect(req.user).toEqual({ ...farmerRow, tokenId: 'jti-1', tokenExpiresAt: 2000000000 });
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('rejects a revoked token', async () => {
    tokens.decodeAccessToken.mockReturnValue({ userId: 5, role: 'farmer', jti: 'jti-1', exp: 2000000000 });
    tokens.isTokenRevoked.mockResolvedValue(true);
    const { res, statusCode, body } = mockResponse();
    const next = mockNext();

    await authenticate(mockRequest({ headers: { Authorization: 'Bearer old-token' } }), res, next);

    expect(statusCode()).toBe(401);
    expect(body()).toEqual({ success: false, message: 'Token has been revoked', error: { code: 'UNAUTHORIZED' } });
    expect(next).not.toHaveBeenCalled();
  });

  it('rejects a token whose user was removed', async () => {
    tokens.decodeAccessToken.mockReturnValue({ userId: 9, role: 'farmer', jti: 'jti-2', exp: 2000000000 });
    const { res, body } = mockResponse();

    await authenticate(mockRequest({ headers: { Authorization: 'Bearer orphan' } }), res, mockNext());

    expect(body()).toEqual({ success: false, message: 'User no longer exists', error: { code: 'UNAUTHORIZED' } });
  });

  it('answers undecodable tokens with a generic message', async () => {
    tokens.decodeAccessToken.mockImplementation(() => {
      throw new Error('jwt malformed');
    });
    const { res, statusCode, body } = mockResponse();

    await authenticate(mockRequest({ headers: { Authorization: 'Bearer nonsense' } }), res, mockNext());

    expect(statusCode()).toBe(401);
    expect(body()).toEqual({ success: false, message: 'Invalid token', error: { code: 'UNAUTHORIZED' } });
  });
});

describe('optionalAuthenticate', () => {
  beforeEach(() => {
    fakeDb.reset();
    tokens.decodeAccessToken.mockReset();
  });

  it('continues as a guest when the token is bad', async () => {
    tokens.decodeAccessToken.mockImplementation(() => {
      throw new Error('invalid signature');
    });
    const req = mockRequest({ headers: { Authorization: 'Bearer bad' } });
    const next = mockNext();

    await optionalAuthenticate(req, mockResponse().res, next);

    expect(req.user).toBeUndefined();
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('continues without a token', async () => {
    const next = mockNext();
    await optionalAuthenticate(mockRequest(), mockResponse().res, next);
    expect(next).toHaveBeenCalledTimes(1);
    expect(tokens.decodeAccessToken).not.toHaveBeenCalled();
  });
});

describe('requireRole', () => {
  const user = { id: 1, email: 'a@example.com', name: 'A', role: 'customer' as const, tokenId: 't', tokenExpiresAt: 0 };

  it('lets allowed roles through', () => {
    const next = mockNext();
    requireRole('customer', 'admin')(mockRequest({ user }), mockResponse().res, next);
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('answers other roles with 403', () => {
    const { res, statusCode } = mockResponse();
    const next = mockNext();
    requireRole('expert')(mockRequest({ user }), res, next);
    expect(statusCode()).toBe(403);
    expect(next).not.toHaveBeenCalled();
  });

  it('answers anonymous requests with 401', () => {
    const { res, statusCode } = mockResponse();
    requireRole('expert')(mockRequest(), res, mockNext());
    expect(statusCode()).toBe(401);
  });
});

describe('requireAuthUser', () => {
  it('throws a 401 HttpError without a user', () => {
    expect(() => requireAuthUser(mockRequest())).toThrowError('Unauthenticated');
  });
});
