import { setTimeout as sleep } from 'node:timers/promises';
import { logger } from './logger.js';

export interface RetryPolicy {
  /** Total attempts, including the first. */
  attempts: number;
  /** Base delay; attempt n waits n * delayMs before running. */
  delayMs: number;
}

/**
 * Run `fn` until it resolves or the attempts run out; the last error is rethrown.
 * An aborted signal stops retrying immediately.
 */
export async function withRetry<T>(
  label: string,
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (attempt > 1) {
      const delay = policy.delayMs * (attempt - 1);
      logger.warn('Retrying operation', { operation: label, attempt, delay_ms: delay });
      if (delay > 0) await sleep(delay, undefined, { signal });
    }
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (signal?.aborted) break;
    }
  }

  throw lastError;
}
