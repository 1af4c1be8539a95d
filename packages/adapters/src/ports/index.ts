/**
 * Port interfaces for adapters
 */

export type { MarketDataError, MarketDataErrorType, MarketDataPort } from "./market-data-port";
export { isTransientMarketDataError } from "./market-data-port";
