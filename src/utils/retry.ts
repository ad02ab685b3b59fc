/**
 * Retry wrapper with linear backoff
 * - Uniform policy: every failure is retried
 * - Formula: delay = backoffMs * attempt (attempt counts failures so far)
 * - Defaults: maxRetries=3, backoffMs=5000
 */

import { toError } from './errors.js';
import { getLogger } from './logger.js';

export interface RetryAttempt {
  /** Number of failed attempts so far (1-based) */
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: Error;
}

export interface RetryOptions {
  maxRetries?: number;
  backoffMs?: number;
  onRetry?: (info: RetryAttempt) => void;
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryOutcome<T> {
  value: T;
  /** Total attempts made, including the successful one */
  attempts: number;
}

/**
 * Thrown when the retry budget is spent
 */
export class RetryError extends Error {
  readonly attempts: number;
  readonly lastError: Error;

  constructor(attempts: number, lastError: Error) {
    super(`Failed after ${attempts} attempt(s): ${lastError.message}`, { cause: lastError });
    this.name = 'RetryError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export function calculateDelay(attempt: number, backoffMs: number): number {
  return backoffMs * attempt;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Executes fn until it succeeds or has failed maxRetries + 1 times.
 * fn receives the 1-based number of the attempt being made.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions
): Promise<RetryOutcome<T>> {
  const maxRetries = options?.maxRetries ?? 3;
  const backoffMs = options?.backoffMs ?? 5000;
  const wait = options?.sleep ?? sleep;

  const logger = getLogger();
  let failures = 0;

  for (;;) {
    try {
      const value = await fn(failures + 1);
      return { value, attempts: failures + 1 };
    } catch (error) {
      const lastError = toError(error);
      failures++;

      if (failures > maxRetries) {
        logger.debug(`Retry budget (${maxRetries}) spent. Giving up: ${lastError.message}`);
        throw new RetryError(failures, lastError);
      }

      const delayMs = calculateDelay(failures, backoffMs);
      options?.onRetry?.({ attempt: failures, maxRetries, delayMs, error: lastError });
      await wait(delayMs);
    }
  }
}
