/**
 * Core Domain Types
 *
 * Pure type definitions for the signal engine.
 * No I/O dependencies, no side effects.
 */

import type { IsoDate } from "./calendar-date";

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Price as a decimal string to avoid floating point issues */
export type PriceStr = string;

/** Ratio as a decimal string, e.g. "-0.12" for -12% */
export type RatioStr = string;

export type { IsoDate };

// ─────────────────────────────────────────────────────────────────────────────
// Enumerations (shared with the db schema)
// ─────────────────────────────────────────────────────────────────────────────

export const POSITION_STATUSES = ["OPEN", "CLOSED"] as const;
export type PositionStatus = (typeof POSITION_STATUSES)[number];

/**
 * - STOP_LOSS: unrealized loss reached the stop threshold
 * - TIME_EXIT: position held for the maximum number of calendar days
 */
export const EXIT_REASONS = ["STOP_LOSS", "TIME_EXIT"] as const;
export type ExitReason = (typeof EXIT_REASONS)[number];

export const ALERT_TYPES = ["ENTRY", "EXIT"] as const;
export type AlertType = (typeof ALERT_TYPES)[number];

// ─────────────────────────────────────────────────────────────────────────────
// Market data
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One daily bar of a lookback window. Windows are ordered newest first.
 */
export interface PriceBar {
  date: IsoDate;
  close: PriceStr | null;
}

/**
 * Close on the evaluated day and on the trading day immediately before it
 */
export interface PricePair {
  close: PriceStr;
  prevClose: PriceStr;
}

// ─────────────────────────────────────────────────────────────────────────────
// Signals (output of evaluation)
// ─────────────────────────────────────────────────────────────────────────────

export interface EntrySignal {
  type: "ENTRY";
  /** asOfClose / prevClose - 1 */
  earningsReturn: RatioStr;
  entryPrice: PriceStr;
}

export interface ExitSignal {
  type: "EXIT";
  reason: ExitReason;
  /** currentClose / entryPrice - 1 */
  pnl: RatioStr;
  exitPrice: PriceStr;
  holdingDays: number;
}
