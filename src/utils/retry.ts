/**
 * Bounded retry driven by a classified result rather than by thrown errors
 */

import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export type Sleep = (ms: number) => Promise<void>;

export interface RetryOptions<T> {
  maxAttempts: number;
  /**
   * Delay before the next attempt, given the result of attempt `attempt`.
   * `null` means the result is final and is returned as is.
   */
  backoffMs: (result: T, attempt: number) => number | null;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Call `fn` until it yields a final result or `maxAttempts` is reached.
 * The result of the last attempt is returned either way; no wait follows it.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions<T>
): Promise<T> {
  const { maxAttempts, backoffMs, sleep: wait = sleep, logger = silentLogger } = options;

  if (maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be at least 1, got ${maxAttempts}`);
  }

  let attempt = 1;
  for (;;) {
    const result = await fn(attempt);
    const delay = backoffMs(result, attempt);

    if (delay === null) {
      return result;
    }

    if (attempt >= maxAttempts) {
      logger.error({ attempt, maxAttempts }, 'All retry attempts exhausted');
      return result;
    }

    logger.warn(
      { attempt, maxAttempts, nextDelayMs: delay },
      'Retry attempt failed, waiting before next attempt'
    );

    await wait(delay);
    attempt++;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export { sleep };
