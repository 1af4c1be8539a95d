/**
 * packages/adapters - Market Data Adapters
 *
 * - Port interface the scanner depends on
 * - FMP REST implementation
 */

// Port interfaces
export * from "./ports";

// FMP adapter
export * from "./fmp";
