/**
 * FMP Adapter
 *
 * Venue-specific implementation of MarketDataPort
 */

export { FmpMarketDataAdapter, parseRetryAfter, type FmpAdapterOptions } from "./market-data-adapter";
export { FmpConfigSchema, type FmpConfig, type FmpConfigInput } from "./types";
