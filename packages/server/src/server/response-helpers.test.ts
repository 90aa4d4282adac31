import type { ServerResponse } from 'http';
import {
  RateLimitExceededError,
  UnauthenticatedError,
} from '@window-guard/core';
import { describe, it, expect, vi } from 'vitest';
import {
  errorEnvelope,
  errorHeaders,
  sendError,
  sendJson,
  sendMethodNotAllowed,
  sendNotFound,
  sendWindowGuardError,
} from './response-helpers.js';

function mockRes() {
  const headers: Record<string, string | number> = {};
  let statusCode = 200;
  let body = '';

  return {
    writeHead: vi.fn(
      (status: number, hdrs: Record<string, string | number>) => {
        statusCode = status;
        Object.assign(headers, hdrs);
      },
    ),
    end: vi.fn((data: string) => {
      body = data;
    }),
    getStatus: () => statusCode,
    getBody: () => body,
    getHeaders: () => headers,
  } as unknown as ServerResponse & {
    getStatus(): number;
    getBody(): string;
    getHeaders(): Record<string, string | number>;
  };
}

describe('sendJson', () => {
  it('should send JSON with default 200 status', () => {
    const res = mockRes();
    sendJson(res, { hello: 'world' });
    expect(res.getStatus()).toBe(200);
    expect(res.getHeaders()).toEqual({
      'Content-Type': 'application/json',
      'Content-Length': 17,
      'Cache-Control': 'no-store',
    });
    expect(res.end).toHaveBeenCalledWith('{"hello":"world"}');
  });

  it('should merge extra headers', () => {
    const res = mockRes();
    sendJson(res, {}, 429, { 'Retry-After': '60' });
    expect(res.getStatus()).toBe(429);
    expect(res.getHeaders()['Retry-After']).toBe('60');
  });
});

describe('sendError', () => {
  it('should send error with 500 by default', () => {
    const res = mockRes();
    sendError(res, 'Something broke');
    expect(res.getStatus()).toBe(500);
    expect(JSON.parse(res.getBody())).toEqual({ error: 'Something broke' });
  });

  it('should send 404 and 405 shortcuts', () => {
    const notFound = mockRes();
    sendNotFound(notFound);
    expect(notFound.getStatus()).toBe(404);
    expect(JSON.parse(notFound.getBody())).toEqual({ error: 'Not found' });

    const notAllowed = mockRes();
    sendMethodNotAllowed(notAllowed);
    expect(notAllowed.getStatus()).toBe(405);
    expect(JSON.parse(notAllowed.getBody())).toEqual({
      error: 'Method not allowed',
    });
  });
});

describe('errorEnvelope', () => {
  it('should describe a denial with its retry hint', () => {
    expect(errorEnvelope(new RateLimitExceededError(60))).toEqual({
      code: 'rate_limit_exceeded',
      message: 'Rate limit exceeded. Try again in 60 seconds.',
      data: { status: 429, retryAfterSeconds: 60 },
    });
  });

  it('should describe a missing user', () => {
    expect(errorEnvelope(new UnauthenticatedError())).toEqual({
      code: 'rate_limit_no_user',
      message: 'User not authenticated',
      data: { status: 401 },
    });
  });
});

describe('errorHeaders', () => {
  it('should set Retry-After only for denials', () => {
    expect(errorHeaders(new RateLimitExceededError(300))).toEqual({
      'Retry-After': '300',
    });
    expect(errorHeaders(new UnauthenticatedError())).toEqual({});
  });
});

describe('sendWindowGuardError', () => {
  it('should send 429 with Retry-After and the envelope', () => {
    const res = mockRes();
    sendWindowGuardError(res, new RateLimitExceededError(60));
    expect(res.getStatus()).toBe(429);
    expect(res.getHeaders()['Retry-After']).toBe('60');
    expect(JSON.parse(res.getBody()).code).toBe('rate_limit_exceeded');
  });
});
