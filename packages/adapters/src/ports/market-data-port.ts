/**
 * Market Data Port - Interface for the end-of-day data provider
 *
 * - Index membership, earnings calendar, daily closes
 * - Adapters own transport retries; callers only see the final outcome
 */

import type { ResultAsync } from "neverthrow";
import type { IsoDate, PriceBar, PricePair, PriceStr } from "@dip-scanner/core";

/**
 * Market data adapter errors
 *
 * timeout, server_error and network are transient and retried by the adapter.
 * rate_limit is returned immediately so callers can back off on their own terms.
 */
export type MarketDataError =
  | { type: "timeout"; message: string }
  | { type: "server_error"; message: string; status: number }
  | { type: "network"; message: string }
  | { type: "rate_limit"; message: string; retryAfterMs?: number }
  | { type: "client_error"; message: string; status: number }
  | { type: "invalid_response"; message: string };

export type MarketDataErrorType = MarketDataError["type"];

const TRANSIENT: ReadonlySet<MarketDataErrorType> = new Set(["timeout", "server_error", "network"]);

export function isTransientMarketDataError(error: MarketDataError): boolean {
  return TRANSIENT.has(error.type);
}

/**
 * Market Data Port interface
 */
export interface MarketDataPort {
  /** Current index constituents; Err on failure, possibly empty on a bad feed */
  listIndexConstituents(): ResultAsync<string[], MarketDataError>;

  /** Symbols reporting earnings on exactly this calendar date */
  earningsOn(date: IsoDate): ResultAsync<string[], MarketDataError>;

  /** Daily bars, newest first, at most `count` entries */
  historicalCloses(symbol: string, count: number): ResultAsync<PriceBar[], MarketDataError>;

  /**
   * Close on `date` and on the trading day before it.
   * Ok(null) when either is outside the lookback window.
   */
  priceAndPrevClose(symbol: string, date: IsoDate): ResultAsync<PricePair | null, MarketDataError>;

  /** Close on `date`, Ok(null) when `date` is not in the window */
  closeOn(symbol: string, date: IsoDate): ResultAsync<PriceStr | null, MarketDataError>;
}
