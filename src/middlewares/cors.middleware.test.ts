import { describe, it, expect, vi } from 'vitest';
import { mockRequest, mockResponse } from '../test/mocks/mockExpress';
import { corsMiddleware } from './cors.middleware';

const preflight = (origin: string, method: string) => {
  const req = mockRequest({
    method: 'OPTIONS',
    headers: { Origin: origin, 'Access-Control-Request-Method': method },
  });
  const mock = mockResponse();
  mock.res.getHeader = vi.fn((name: string) => mock.headers[name.toLowerCase()]);

  return new Promise<{ headers: Record<string, string>; error: unknown }>((resolve) => {
    mock.res.end = vi.fn(() => {
      resolve({ headers: mock.headers, error: undefined });
      return mock.res;
    });
    corsMiddleware(req, mock.res, (error?: unknown) => resolve({ headers: mock.headers, error }));
  });
};

describe('corsMiddleware', () => {
  it('answers a PATCH preflight from the frontend origin', async () => {
    const { headers, error } = await preflight('http://localhost:5173', 'PATCH');

    expect(error).toBeUndefined();
    expect(headers['access-control-allow-origin']).toBe('http://localhost:5173');
    expect(headers['access-control-allow-methods']).toBe('GET,POST,PUT,PATCH,DELETE,OPTIONS');
  });

  it('rejects origins outside the allow-list', async () => {
    const { error } = await preflight('https://elsewhere.test', 'GET');

    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({ message: 'Not allowed by CORS' });
  });
});
