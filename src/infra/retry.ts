import { setTimeout as sleep } from 'node:timers/promises';
import { logger } from './logger.js';

export type RetryOptions = {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  isTransient: (error: unknown) => boolean;
  onExhausted: (error: unknown) => Error;
  label: string;
};

/**
 * Exponential backoff: base * 2^(attempt - 1), capped at max
 */
export function computeBackoffMs(attempt: number, baseMs: number, maxMs: number): number {
  if (attempt < 1 || baseMs <= 0) return 0;
  return Math.min(maxMs, baseMs * 2 ** (attempt - 1));
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EHOSTUNREACH',
]);

/**
 * Network-level failures shared by both store adapters
 */
export function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' && TRANSIENT_CODES.has(code)) return true;
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

/**
 * Runs `fn`, retrying transient failures with exponential backoff.
 * Non-transient errors are rethrown untouched; exhaustion is converted by `onExhausted`.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const maxDelayMs = options.maxDelayMs ?? options.baseDelayMs * 8;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!options.isTransient(error)) {
        throw error;
      }
      lastError = error;
      if (attempt < options.attempts) {
        const delay = computeBackoffMs(attempt, options.baseDelayMs, maxDelayMs);
        logger.warn('Transient failure, retrying', {
          operation: options.label,
          attempt,
          delayMs: delay,
          error: error instanceof Error ? error.message : String(error),
        });
        await sleep(delay);
      }
    }
  }

  throw options.onExhausted(lastError);
}

/**
 * Rejects with `onTimeout()` if `promise` has not settled within `ms`
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
