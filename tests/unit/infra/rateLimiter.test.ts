import { describe, it, expect, vi } from 'vitest';
import type { Request, Response } from 'express';
import { createRateLimiter } from '../../../src/infra/rateLimiter.js';

function fakeResponse() {
  const headers = new Map<string, string>();
  const res = {
    statusCode: 200,
    body: undefined as unknown,
    setHeader(name: string, value: string) {
      headers.set(name, value);
      return res;
    },
    status(code: number) {
      res.statusCode = code;
      return res;
    },
    json(body: unknown) {
      res.body = body;
      return res;
    },
  };
  return { res, headers };
}

describe('createRateLimiter', () => {
  const req = { ip: '10.0.0.1' } as Request;

  it('allows up to max requests per window then answers 429', () => {
    const limiter = createRateLimiter({ windowMs: 60000, max: 2 });
    const next = vi.fn();

    for (let i = 0; i < 3; i++) {
      const { res, headers } = fakeResponse();
      limiter(req, res as unknown as Response, next);
      if (i === 2) {
        expect(res.statusCode).toBe(429);
        expect(res.body).toEqual({
          error: 'RATE_LIMITED',
          message: 'Too many requests. Please retry later.',
        });
        expect(headers.get('X-RateLimit-Remaining')).toBe('0');
        expect(headers.has('Retry-After')).toBe(true);
      }
    }

    expect(next).toHaveBeenCalledTimes(2);
  });

  it('is a pass-through when disabled', () => {
    const limiter = createRateLimiter({ windowMs: 0, max: 0 });
    const next = vi.fn();
    const { res } = fakeResponse();

    limiter(req, res as unknown as Response, next);

    expect(next).toHaveBeenCalledTimes(1);
  });
});
