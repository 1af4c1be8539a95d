/**
 * Per-item scan outcomes
 *
 * Every symbol (entry scan) or position (exit scan) yields exactly one outcome.
 * Failures are reported here and in the log; they never stop the batch.
 */

export type ItemOutcome =
  | { kind: "alerted"; item: string; eventKey: string }
  | { kind: "already_recorded"; item: string; eventKey: string }
  | { kind: "no_signal"; item: string }
  | { kind: "skipped"; item: string; reason: SkipReason }
  | { kind: "failed"; item: string; error: string };

export type SkipReason = "no_price" | "rate_limited" | "unavailable" | "before_entry" | "already_closed";

export interface ScanSummary {
  /** Alerts inserted by this run; the authoritative counter */
  newAlerts: number;
  alreadyRecorded: number;
  noSignal: number;
  skipped: number;
  failed: number;
}

export function summarizeOutcomes(outcomes: readonly ItemOutcome[]): ScanSummary {
  const summary: ScanSummary = { newAlerts: 0, alreadyRecorded: 0, noSignal: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case "alerted":
        summary.newAlerts++;
        break;
      case "already_recorded":
        summary.alreadyRecorded++;
        break;
      case "no_signal":
        summary.noSignal++;
        break;
      case "skipped":
        summary.skipped++;
        break;
      case "failed":
        summary.failed++;
        break;
    }
  }
  return summary;
}

export const EMPTY_SUMMARY: ScanSummary = Object.freeze({
  newAlerts: 0,
  alreadyRecorded: 0,
  noSignal: 0,
  skipped: 0,
  failed: 0,
});

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}
