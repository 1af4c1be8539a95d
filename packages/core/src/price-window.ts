/**
 * Lookups over a daily lookback window (newest first).
 *
 * The window is matched by exact date. A date that is missing (weekend, holiday,
 * feed not yet updated) or that sits on the oldest edge of the window yields null;
 * nothing is interpolated.
 */

import type { IsoDate, PriceBar, PricePair, PriceStr } from "./types";

export function findPricePair(window: readonly PriceBar[], asOf: IsoDate): PricePair | null {
  const idx = window.findIndex(bar => bar.date === asOf);
  if (idx === -1 || idx + 1 >= window.length) {
    return null;
  }

  const close = window[idx].close;
  const prevClose = window[idx + 1].close;
  if (close === null || prevClose === null) {
    return null;
  }

  return { close, prevClose };
}

export function findCloseOn(window: readonly PriceBar[], asOf: IsoDate): PriceStr | null {
  return window.find(bar => bar.date === asOf)?.close ?? null;
}
