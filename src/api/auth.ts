import { createHash, timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import { UnauthorizedError } from '../domain/errors.js';

export const API_KEY_HEADER = 'x-api-key';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Constant-time comparison; hashing first makes the buffers equal length
 */
export function apiKeyMatches(candidate: string | undefined, expected: string): boolean {
  if (candidate === undefined || candidate.length === 0) return false;
  return timingSafeEqual(digest(candidate), digest(expected));
}

export function requireApiKey(apiKey: string) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!apiKeyMatches(req.get(API_KEY_HEADER), apiKey)) {
      next(new UnauthorizedError());
      return;
    }
    next();
  };
}
