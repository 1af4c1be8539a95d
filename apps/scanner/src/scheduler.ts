/**
 * Daily job scheduler
 *
 * Re-runs the daily job for the current UTC date on a fixed interval.
 * Repeated runs for one date are no-ops, so the interval only bounds latency.
 */

import { toIsoDate } from "@dip-scanner/core";
import { createIntervalWorker, type IntervalWorker } from "@dip-scanner/utils";

import type { ScanDeps } from "./usecases";
import { runDailyJob } from "./usecases";

export function startDailyJobScheduler(deps: ScanDeps, intervalMs: number): IntervalWorker {
  return createIntervalWorker({
    name: "daily-job-scheduler",
    intervalMs,
    startupMetadata: { intervalMs },
    runOnce: async () => {
      await runDailyJob(toIsoDate(deps.clock()), deps);
    },
  });
}
