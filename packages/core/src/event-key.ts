/**
 * Alert event keys
 *
 * An event key is the only deduplication handle for alerts: the same signal
 * evaluated twice must produce byte-identical keys.
 *
 *   ENTRY|{symbol}|{asOf}
 *   EXIT|{symbol}|{entryDate}|{exitDate}|{reason}
 */

import type { ExitReason, IsoDate } from "./types";

const SEPARATOR = "|";

export function entryEventKey(symbol: string, asOf: IsoDate): string {
  return ["ENTRY", symbol, asOf].join(SEPARATOR);
}

export function exitEventKey(symbol: string, entryDate: IsoDate, exitDate: IsoDate, reason: ExitReason): string {
  return ["EXIT", symbol, entryDate, exitDate, reason].join(SEPARATOR);
}
