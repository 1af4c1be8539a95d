/**
 * packages/core - Pure Signal Logic
 *
 * Entry/exit rules, event keys, alert text and lookback-window lookups.
 * NO I/O dependencies (DB, HTTP, FS).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  PriceStr,
  RatioStr,
  IsoDate,
  PositionStatus,
  ExitReason,
  AlertType,
  PriceBar,
  PricePair,
  EntrySignal,
  ExitSignal,
} from "./types";
export { POSITION_STATUSES, EXIT_REASONS, ALERT_TYPES } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Calendar dates
// ─────────────────────────────────────────────────────────────────────────────
export { addDays, daysBetween, isIsoDate, parseIsoDate, toIsoDate } from "./calendar-date";

// ─────────────────────────────────────────────────────────────────────────────
// Signal Evaluator
// ─────────────────────────────────────────────────────────────────────────────
export {
  evaluateEntry,
  evaluateExit,
  relativeChange,
  isEntryReturnInRange,
  ENTRY_RETURN_MIN,
  ENTRY_RETURN_MAX,
  STOP_LOSS_THRESHOLD,
  MAX_HOLDING_DAYS,
} from "./signal-evaluator";

// ─────────────────────────────────────────────────────────────────────────────
// Alerts
// ─────────────────────────────────────────────────────────────────────────────
export { entryEventKey, exitEventKey } from "./event-key";
export { formatEntryMessage, formatExitMessage, formatPercent, formatPrice } from "./alert-message";

// ─────────────────────────────────────────────────────────────────────────────
// Price window
// ─────────────────────────────────────────────────────────────────────────────
export { findPricePair, findCloseOn } from "./price-window";
