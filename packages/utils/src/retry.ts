/**
 * Retry with exponential backoff for Result-returning operations.
 *
 * Delay before retry n (1-based) is `initialDelayMs * multiplier^(n-1)`, capped at `maxDelayMs`.
 * The caller decides which errors are transient through `shouldRetry`; everything else
 * is returned on the first failure.
 */

import { ResultAsync } from "neverthrow";
import type { Result } from "neverthrow";

import { logger } from "./logger";

export interface BackoffConfig {
  /** Total attempts including the first one */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  maxAttempts: 3,
  initialDelayMs: 2_000,
  maxDelayMs: 10_000,
  multiplier: 2,
};

export interface RetryOptions<E> {
  /** Used in log lines only */
  label: string;
  shouldRetry: (error: E) => boolean;
  config?: BackoffConfig;
  /** Injected by tests to avoid real waiting */
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => {
    setTimeout(resolve, ms);
  });

export function computeBackoffDelay(retryNumber: number, config: BackoffConfig = DEFAULT_BACKOFF): number {
  const raw = config.initialDelayMs * Math.pow(config.multiplier, Math.max(0, retryNumber - 1));
  return Math.min(config.maxDelayMs, raw);
}

export function retryWithBackoff<T, E>(
  operation: () => ResultAsync<T, E>,
  options: RetryOptions<E>,
): ResultAsync<T, E> {
  const config = options.config ?? DEFAULT_BACKOFF;
  const wait = options.sleep ?? sleep;

  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    throw new RangeError(`${options.label}: maxAttempts must be a positive integer`);
  }

  const run = async (): Promise<Result<T, E>> => {
    for (let attempt = 1; ; attempt++) {
      const result = await operation();
      if (result.isOk()) return result;
      if (!options.shouldRetry(result.error) || attempt >= config.maxAttempts) return result;

      const delayMs = computeBackoffDelay(attempt, config);
      logger.warn(`${options.label}: attempt ${String(attempt)} failed, retrying in ${String(delayMs)}ms`, {
        error: result.error,
      });
      await wait(delayMs);
    }
  };

  return new ResultAsync(run());
}
