import { describe, expect, it, vi } from 'vitest';
import { backoffDelay, retryBudget, withRetry, type RetryPolicy } from './retry.js';
import {
  ConnectionError,
  MalformedResponseError,
  ModelNotFoundError,
  TimeoutError,
  WriteError,
} from '../errors.js';

const policy: RetryPolicy = { maxRetries: 3, backoff: 'exponential', baseDelayMs: 100, maxDelayMs: 1000 };

function failingTimes(errors: Error[]): (attempt: number) => Promise<string> {
  return async attempt => {
    const error = errors[attempt - 1];
    if (error) throw error;
    return `ok after ${attempt}`;
  };
}

describe('retryBudget', () => {
  it('gives transport errors the full budget', () => {
    expect(retryBudget(new TimeoutError(100), 3)).toEqual({ bucket: 'transport', budget: 3 });
    expect(retryBudget(new ConnectionError('refused'), 3)).toEqual({ bucket: 'transport', budget: 3 });
  });

  it('retries malformed responses exactly once, whatever maxRetries is', () => {
    expect(retryBudget(new MalformedResponseError('empty'), 3)).toEqual({ bucket: 'malformed', budget: 1 });
    expect(retryBudget(new MalformedResponseError('empty'), 0)).toEqual({ bucket: 'malformed', budget: 1 });
  });

  it('never retries other errors', () => {
    expect(retryBudget(new ModelNotFoundError('llava'), 3).budget).toBe(0);
    expect(retryBudget(new WriteError('disk full'), 3).budget).toBe(0);
    expect(retryBudget(new Error('plain'), 3).budget).toBe(0);
  });
});

describe('backoffDelay', () => {
  it('doubles exponentially up to the cap', () => {
    expect([1, 2, 3, 4, 5].map(n => backoffDelay(n, policy))).toEqual([100, 200, 400, 800, 1000]);
  });

  it('grows linearly up to the cap', () => {
    const linear: RetryPolicy = { ...policy, backoff: 'linear', maxDelayMs: 250 };
    expect([1, 2, 3].map(n => backoffDelay(n, linear))).toEqual([100, 200, 250]);
  });
});

describe('withRetry', () => {
  it('returns the first success', async () => {
    const sleep = vi.fn(async () => undefined);
    const onAttempt = vi.fn();

    const result = await withRetry(
      failingTimes([new TimeoutError(100), new ConnectionError('reset')]),
      policy,
      { sleep, onAttempt }
    );

    expect(result).toBe('ok after 3');
    expect(onAttempt.mock.calls).toEqual([[1], [2], [3]]);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('rethrows a transport error once the budget is spent', async () => {
    const errors = [1, 2, 3, 4].map(() => new TimeoutError(100));
    const onRetry = vi.fn();

    await expect(
      withRetry(failingTimes(errors), policy, { sleep: async () => undefined, onRetry })
    ).rejects.toBe(errors[3]);
    expect(onRetry).toHaveBeenCalledTimes(3);
  });

  it('does not retry a missing model', async () => {
    const operation = vi.fn(failingTimes([new ModelNotFoundError('llava')]));

    await expect(withRetry(operation, policy, { sleep: async () => undefined })).rejects.toThrow(
      'Model not found: llava'
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('retries a malformed response once, independently of transport retries', async () => {
    const operation = vi.fn(
      failingTimes([new MalformedResponseError('empty'), new TimeoutError(100), new MalformedResponseError('empty')])
    );

    await expect(withRetry(operation, policy, { sleep: async () => undefined })).rejects.toThrow(
      MalformedResponseError
    );
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('still retries a malformed response when transport retries are off', async () => {
    const noRetries: RetryPolicy = { ...policy, maxRetries: 0 };

    await expect(
      withRetry(failingTimes([new MalformedResponseError('empty')]), noRetries, { sleep: async () => undefined })
    ).resolves.toBe('ok after 2');
    await expect(
      withRetry(failingTimes([new TimeoutError(100)]), noRetries, { sleep: async () => undefined })
    ).rejects.toThrow(TimeoutError);
  });
});
