/**
 * packages/utils - Shared runtime helpers
 *
 * Logging, retry with exponential backoff and the interval worker used by the scanner app.
 */

export { LogLevel, logger, type LogRecord, type LogSink } from "./logger";
export {
  DEFAULT_BACKOFF,
  computeBackoffDelay,
  retryWithBackoff,
  sleep,
  type BackoffConfig,
  type RetryOptions,
} from "./retry";
export { createIntervalWorker, type IntervalWorker, type WorkerOptions } from "./worker";
