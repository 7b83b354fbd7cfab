import type { Request, Response, NextFunction } from 'express';

type RateLimitOptions = {
  windowMs: number;
  max: number;
};

type RateLimitState = {
  count: number;
  resetAt: number;
};

/**
 * Fixed-window limiter keyed by client IP. Per process; each gateway instance counts on its own.
 */
export function createRateLimiter({ windowMs, max }: RateLimitOptions) {
  if (windowMs <= 0 || max <= 0) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const hits = new Map<string, RateLimitState>();
  let nextSweepAt = Date.now() + windowMs;

  const sweep = (now: number) => {
    if (now < nextSweepAt) return;
    for (const [key, state] of hits) {
      if (now >= state.resetAt) hits.delete(key);
    }
    nextSweepAt = now + windowMs;
  };

  return (req: Request, res: Response, next: NextFunction) => {
    const now = Date.now();
    sweep(now);

    const key = req.ip || 'unknown';
    let state = hits.get(key);
    if (!state || now >= state.resetAt) {
      state = { count: 0, resetAt: now + windowMs };
      hits.set(key, state);
    }
    state.count += 1;

    res.setHeader('X-RateLimit-Limit', String(max));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, max - state.count)));
    res.setHeader('X-RateLimit-Reset', String(state.resetAt));

    if (state.count > max) {
      res.setHeader('Retry-After', String(Math.ceil((state.resetAt - now) / 1000)));
      res.status(429).json({
        error: 'RATE_LIMITED',
        message: 'Too many requests. Please retry later.',
      });
      return;
    }

    next();
  };
}
