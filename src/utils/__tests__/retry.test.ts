import { describe, it, expect } from 'vitest';
import { withRetry } from '../retry.js';

describe('withRetry', () => {
  it('returns the first final result', async () => {
    const sleeps: number[] = [];
    const attempts: number[] = [];

    const result = await withRetry(
      async (attempt) => {
        attempts.push(attempt);
        return attempt < 2 ? 'retry' : 'done';
      },
      {
        maxAttempts: 5,
        backoffMs: (r, attempt) => (r === 'retry' ? attempt * 100 : null),
        sleep: async (ms) => {
          sleeps.push(ms);
        },
      }
    );

    expect(result).toBe('done');
    expect(attempts).toEqual([1, 2]);
    expect(sleeps).toEqual([100]);
  });

  it('returns the last result without waiting after the final attempt', async () => {
    const sleeps: number[] = [];
    let calls = 0;

    const result = await withRetry(
      async () => {
        calls++;
        return 'retry';
      },
      {
        maxAttempts: 3,
        backoffMs: () => 1000,
        sleep: async (ms) => {
          sleeps.push(ms);
        },
      }
    );

    expect(result).toBe('retry');
    expect(calls).toBe(3);
    expect(sleeps).toEqual([1000, 1000]);
  });

  it('rejects a non-positive attempt budget', async () => {
    await expect(
      withRetry(async () => 'x', { maxAttempts: 0, backoffMs: () => null })
    ).rejects.toBeInstanceOf(RangeError);
  });

  it('propagates errors thrown by the operation', async () => {
    await expect(
      withRetry(
        async () => {
          throw new Error('unexpected');
        },
        { maxAttempts: 3, backoffMs: () => null }
      )
    ).rejects.toThrow('unexpected');
  });
});
