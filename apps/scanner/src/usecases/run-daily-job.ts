/**
 * Run Daily Job Usecase
 *
 * ScanningEntries -> ScanningExits -> Done, both phases for the same as-of date.
 * The phases commit independently: an exit-phase failure keeps the entry results
 * and is reported in the result, not thrown. Re-running the same date is safe.
 */

import type { IsoDate } from "@dip-scanner/core";
import { logger } from "@dip-scanner/utils";

import { EMPTY_SUMMARY, type ScanSummary } from "./item-outcome";
import type { ScanDeps } from "./scan-deps";
import { scanEntries } from "./scan-entries";
import { scanExits } from "./scan-exits";

export type ScanPhase = "entries" | "exits";

export interface DailyJobResult {
  asOf: IsoDate;
  newEntryAlerts: number;
  newExitAlerts: number;
  entries: ScanSummary;
  exits: ScanSummary;
  /** Phases that aborted before evaluating any item */
  failedPhases: Array<{ phase: ScanPhase; message: string }>;
}

export async function runDailyJob(asOf: IsoDate, deps: ScanDeps): Promise<DailyJobResult> {
  const startedAt = deps.clock();
  const failedPhases: DailyJobResult["failedPhases"] = [];
  logger.info("Daily job started", { asOf });

  const entryResult = await scanEntries(asOf, deps);
  const entries = entryResult.match(
    summary => summary,
    error => {
      logger.error("Daily job: entry phase aborted", { asOf, message: error.message });
      failedPhases.push({ phase: "entries", message: error.message });
      return EMPTY_SUMMARY;
    },
  );

  const exitResult = await scanExits(asOf, deps);
  const exits = exitResult.match(
    summary => summary,
    error => {
      logger.error("Daily job: exit phase aborted", { asOf, message: error.message });
      failedPhases.push({ phase: "exits", message: error.message });
      return EMPTY_SUMMARY;
    },
  );

  const result: DailyJobResult = {
    asOf,
    newEntryAlerts: entries.newAlerts,
    newExitAlerts: exits.newAlerts,
    entries,
    exits,
    failedPhases,
  };

  logger.info("Daily job finished", {
    asOf,
    newEntryAlerts: result.newEntryAlerts,
    newExitAlerts: result.newExitAlerts,
    failedPhases: failedPhases.map(p => p.phase).join(",") || "none",
    durationMs: deps.clock().getTime() - startedAt.getTime(),
  });

  return result;
}
