import express from 'express';
import type { Response } from 'express';
import { vi } from 'vitest';
import type { AuthRequest, AuthUser } from '../../types/request.types';

interface MockRequestInit {
  headers?: Record<string, string>;
  params?: Record<string, string>;
  query?: Record<string, unknown>;
  body?: unknown;
  user?: AuthUser;
  path?: string;
  method?: string;
  ip?: string;
}

const value = (v: unknown): PropertyDescriptor => ({ value: v, writable: true, enumerable: true });

/**
 * A request built on Express' own prototype, so helpers like `req.get` work.
 * Getters that need a mounted app (ip, path) are replaced with plain values.
 */
export const mockRequest = (init: MockRequestInit = {}): AuthRequest => {
  const headers = Object.fromEntries(
    Object.entries(init.headers ?? {}).map(([name, header]) => [name.toLowerCase(), header])
  );
  const path = init.path ?? '/';

  const req: AuthRequest = Object.create(express.request, {
    headers: value(headers),
    params: value(init.params ?? {}),
    query: value(init.query ?? {}),
    body: value(init.body ?? {}),
    user: value(init.user),
    path: value(path),
    originalUrl: value(path),
    url: value(path),
    method: value(init.method ?? 'GET'),
    ip: value(init.ip ?? '127.0.0.1'),
  });
  return req;
};

export interface MockResponse {
  res: Response;
  statusCode: () => number;
  body: () => unknown;
  headers: Record<string, string>;
}

/**
 * Records status, JSON body and headers instead of writing to a socket
 */
export const mockResponse = (): MockResponse => {
  let statusCode = 200;
  let body: unknown;
  const headers: Record<string, string> = {};

  const res: Response = Object.create(express.response);
  res.status = vi.fn((code: number) => {
    statusCode = code;
    return res;
  });
  res.json = vi.fn((payload: unknown) => {
    body = payload;
    return res;
  });
  res.setHeader = vi.fn((name: string, header: number | string | readonly string[]) => {
    headers[name.toLowerCase()] = String(header);
    return res;
  });
  res.set = vi.fn((field: string | Record<string, string>, header?: string | string[]) => {
    const entries: [string, unknown][] = typeof field === 'string' ? [[field, header]] : Object.entries(field);
    for (const [name, fieldValue] of entries) {
      headers[name.toLowerCase()] = String(fieldValue ?? '');
    }
    return res;
  });

  return { res, statusCode: () => statusCode, body: () => body, headers };
};

export const mockNext = () => vi.fn();
