/**
 * Interval worker
 *
 * Runs `runOnce` immediately and then every `intervalMs`. Iterations never overlap:
 * a tick that arrives while the previous run is still in flight is skipped.
 * Shutdown waits for the in-flight run (bounded by `stopTimeoutMs`) and then runs `cleanup`.
 */

import { logger } from "./logger";

export interface WorkerOptions {
  /** Name of the worker (for logging) */
  name: string;
  intervalMs: number;
  runOnce: () => Promise<void>;
  cleanup?: () => Promise<void> | void;
  startupMetadata?: Record<string, unknown>;
  /** Upper bound on how long stop() waits for an in-flight run */
  stopTimeoutMs?: number;
}

export interface IntervalWorker {
  stop(): Promise<void>;
  isRunning(): boolean;
}

export function createIntervalWorker(options: WorkerOptions): IntervalWorker {
  const { name, intervalMs, runOnce, cleanup, startupMetadata } = options;
  const stopTimeoutMs = options.stopTimeoutMs ?? 5_000;

  logger.info(`Starting ${name}`, startupMetadata ?? {});

  let runningPromise: Promise<void> | null = null;
  let stopped = false;

  const tick = (): void => {
    if (stopped) return;
    if (runningPromise) {
      logger.debug(`${name}: previous iteration still running, skipping tick`);
      return;
    }

    runningPromise = runOnce()
      .catch((error: unknown) => {
        logger.error(`${name} iteration failed`, { error });
      })
      .finally(() => {
        runningPromise = null;
      });
  };

  tick();
  const interval = setInterval(tick, intervalMs);

  return {
    isRunning: () => runningPromise !== null,

    async stop(): Promise<void> {
      if (stopped) return;
      stopped = true;

      logger.info(`Shutting down ${name}...`);
      clearInterval(interval);

      if (runningPromise) {
        let timer: ReturnType<typeof setTimeout> | undefined;
        await Promise.race([
          runningPromise,
          new Promise<void>(resolve => {
            timer = setTimeout(resolve, stopTimeoutMs);
          }),
        ]);
        clearTimeout(timer);
      }

      if (cleanup) {
        await cleanup();
      }

      logger.info(`${name} shutdown complete`);
    },
  };
}
