/**
 * Signal Evaluator - Pure entry/exit decision logic
 *
 * Entry: the earnings-day close-to-close return falls in [-30%, -5%].
 * Exit:  STOP_LOSS when pnl <= -10%, otherwise TIME_EXIT after 50 calendar days.
 *
 * All bounds are inclusive. Ratios are computed with decimal.js so values such as
 * 95/100 - 1 land exactly on -0.05 instead of a float neighbour.
 *
 * This module is pure (no I/O, no throw on bad prices: they simply yield no signal).
 */

import Decimal from "decimal.js";

import { daysBetween } from "./calendar-date";
import type { EntrySignal, ExitSignal, IsoDate, PriceStr } from "./types";

export const ENTRY_RETURN_MIN = new Decimal("-0.30");
export const ENTRY_RETURN_MAX = new Decimal("-0.05");
export const STOP_LOSS_THRESHOLD = new Decimal("-0.10");
export const MAX_HOLDING_DAYS = 50;

function toPositiveDecimal(value: PriceStr): Decimal | null {
  let d: Decimal;
  try {
    d = new Decimal(value);
  } catch {
    return null;
  }
  return d.isFinite() && d.gt(0) ? d : null;
}

/**
 * `current / base - 1`, or null when either price is unusable (non-numeric, zero, negative)
 */
export function relativeChange(current: PriceStr, base: PriceStr): Decimal | null {
  const c = toPositiveDecimal(current);
  const b = toPositiveDecimal(base);
  if (c === null || b === null) return null;
  return c.div(b).minus(1);
}

export function isEntryReturnInRange(earningsReturn: Decimal): boolean {
  return earningsReturn.gte(ENTRY_RETURN_MIN) && earningsReturn.lte(ENTRY_RETURN_MAX);
}

/**
 * Evaluate the entry rule for an earnings day.
 *
 * @returns the signal, or null when the return is out of range or a price is unusable
 */
export function evaluateEntry(asOfClose: PriceStr, prevClose: PriceStr): EntrySignal | null {
  const earningsReturn = relativeChange(asOfClose, prevClose);
  if (earningsReturn === null || !isEntryReturnInRange(earningsReturn)) {
    return null;
  }

  return {
    type: "ENTRY",
    earningsReturn: earningsReturn.toString(),
    entryPrice: asOfClose,
  };
}

/**
 * Evaluate the exit rules for an open position.
 *
 * Priority: STOP_LOSS is checked first and wins when both rules hold.
 * holdingDays counts calendar days from the entry date (entry day itself is day 0).
 */
export function evaluateExit(
  entryPrice: PriceStr,
  currentClose: PriceStr,
  entryDate: IsoDate,
  asOfDate: IsoDate,
): ExitSignal | null {
  const pnl = relativeChange(currentClose, entryPrice);
  if (pnl === null) return null;

  const holdingDays = daysBetween(entryDate, asOfDate);

  if (pnl.lte(STOP_LOSS_THRESHOLD)) {
    return { type: "EXIT", reason: "STOP_LOSS", pnl: pnl.toString(), exitPrice: currentClose, holdingDays };
  }

  if (holdingDays >= MAX_HOLDING_DAYS) {
    return { type: "EXIT", reason: "TIME_EXIT", pnl: pnl.toString(), exitPrice: currentClose, holdingDays };
  }

  return null;
}
