/**
 * Human-readable alert bodies, delivered as-is by the external notifier.
 */

import Decimal from "decimal.js";

import type { EntrySignal, ExitSignal, IsoDate } from "./types";

/** ratio -> "-12.00" (percent, 2dp, half-even) */
export function formatPercent(ratio: string): string {
  return new Decimal(ratio).times(100).toFixed(2, Decimal.ROUND_HALF_EVEN);
}

export function formatPrice(price: string): string {
  return new Decimal(price).toFixed(2, Decimal.ROUND_HALF_EVEN);
}

export function formatEntryMessage(symbol: string, asOf: IsoDate, signal: EntrySignal): string {
  return [
    `[ENTRY] ${symbol} ${asOf}`,
    `Earnings day return: ${formatPercent(signal.earningsReturn)}%`,
    `Entry price (close): ${formatPrice(signal.entryPrice)}`,
  ].join("\n");
}

export function formatExitMessage(symbol: string, exitDate: IsoDate, signal: ExitSignal): string {
  return [
    `[EXIT-${signal.reason}] ${symbol} ${exitDate}`,
    `PnL: ${formatPercent(signal.pnl)}%`,
    `Exit price (close): ${formatPrice(signal.exitPrice)}`,
    `Holding days: ${String(signal.holdingDays)}`,
  ].join("\n");
}
