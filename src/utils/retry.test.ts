/**
 * Tests for the linear-backoff retry wrapper
 */

import { describe, it, expect, jest } from '@jest/globals';
import { calculateDelay, retry, RetryError, type RetryAttempt } from './retry.js';

const noSleep = (): Promise<void> => Promise.resolve();

describe('retry', () => {
  it('returns the value after a single attempt on success', async () => {
    const outcome = await retry(async () => 'ok', { sleep: noSleep });

    expect(outcome).toEqual({ value: 'ok', attempts: 1 });
  });

  it('succeeds after k transient failures with k + 1 attempts', async () => {
    let calls = 0;
    const outcome = await retry(
      async () => {
        calls++;
        if (calls <= 2) throw new Error('boom');
        return calls;
      },
      { maxRetries: 3, sleep: noSleep }
    );

    expect(outcome).toEqual({ value: 3, attempts: 3 });
  });

  it('makes exactly maxRetries + 1 attempts before giving up', async () => {
    let calls = 0;
    const error = await retry(
      async () => {
        calls++;
        throw new Error('always');
      },
      { maxRetries: 2, sleep: noSleep }
    ).catch((caught: unknown) => caught);

    expect(calls).toBe(3);
    expect(error).toBeInstanceOf(RetryError);
    if (!(error instanceof RetryError)) throw error;
    expect(error.attempts).toBe(3);
    expect(error.lastError.message).toBe('always');
    expect(error.message).toBe('Failed after 3 attempt(s): always');
  });

  it('makes one attempt when maxRetries is 0', async () => {
    let calls = 0;
    await retry(
      async () => {
        calls++;
        throw new Error('nope');
      },
      { maxRetries: 0, sleep: noSleep }
    ).catch(() => undefined);

    expect(calls).toBe(1);
  });

  it('waits backoffMs * attempt between attempts', async () => {
    const sleep = jest.fn((_ms: number) => Promise.resolve());

    await retry(
      async () => {
        throw new Error('x');
      },
      { maxRetries: 3, backoffMs: 100, sleep }
    ).catch(() => undefined);

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 300]);
  });

  it('passes the 1-based attempt number to fn', async () => {
    const seen: number[] = [];

    await retry(
      async (attempt) => {
        seen.push(attempt);
        if (attempt < 3) throw new Error('retry me');
        return attempt;
      },
      { sleep: noSleep }
    );

    expect(seen).toEqual([1, 2, 3]);
  });

  it('reports each retry through onRetry', async () => {
    const retries: RetryAttempt[] = [];
    const failure = new Error('flaky');
    let calls = 0;

    await retry(
      async () => {
        calls++;
        if (calls === 1) throw failure;
        return 'done';
      },
      { maxRetries: 2, backoffMs: 10, sleep: noSleep, onRetry: (info) => retries.push(info) }
    );

    expect(retries).toEqual([{ attempt: 1, maxRetries: 2, delayMs: 10, error: failure }]);
  });

  it('wraps non-Error rejections', async () => {
    const error = await retry(
      async () => {
        throw 'plain string';
      },
      { maxRetries: 0, sleep: noSleep }
    ).catch((caught: unknown) => caught);

    if (!(error instanceof RetryError)) throw error;
    expect(error.lastError.message).toBe('plain string');
  });
});

describe('calculateDelay', () => {
  it('grows linearly with the attempt number', () => {
    expect(calculateDelay(1, 5000)).toBe(5000);
    expect(calculateDelay(3, 5000)).toBe(15000);
  });
});
