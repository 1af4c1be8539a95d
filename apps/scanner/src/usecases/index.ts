export { runDailyJob, type DailyJobResult, type ScanPhase } from "./run-daily-job";
export { scanEntries, type ScanEntriesError } from "./scan-entries";
export { scanExits, type ScanExitsError } from "./scan-exits";
export {
  listPendingAlerts,
  PENDING_LIMIT_DEFAULT,
  PENDING_LIMIT_MAX,
  type ListPendingAlertsError,
  type PendingAlert,
} from "./list-pending-alerts";
export { markAlertSent, type MarkAlertSentResult } from "./mark-alert-sent";
export { health } from "./health";
export { summarizeOutcomes, type ItemOutcome, type ScanSummary, type SkipReason } from "./item-outcome";
export type { ScanDeps } from "./scan-deps";
