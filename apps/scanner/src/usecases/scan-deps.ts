/**
 * Dependencies shared by the scan use cases
 */

import { isTransientMarketDataError, type MarketDataError, type MarketDataPort } from "@dip-scanner/adapters";
import type { PositionRepository, UnitOfWork } from "@dip-scanner/repositories";
import { logger, sleep } from "@dip-scanner/utils";

import type { SymbolUniverseCache } from "../services/symbol-universe-cache";
import type { ItemOutcome } from "./item-outcome";

export interface ScanDeps {
  marketData: MarketDataPort;
  universe: SymbolUniverseCache;
  positions: PositionRepository;
  unitOfWork: UnitOfWork;
  clock: () => Date;
  universeTtlMs: number;
  /** Pause applied after a rate-limited item; injected by tests */
  sleep?: (ms: number) => Promise<void>;
}

/** Pause after a 429 when the provider sends no Retry-After */
export const DEFAULT_RATE_LIMIT_PAUSE_MS = 1_000;

/** Upper bound on a single rate-limit pause */
export const MAX_RATE_LIMIT_PAUSE_MS = 60_000;

/**
 * Map a market-data failure for one item to its outcome, pausing after a 429.
 * Transient errors have already been retried by the adapter, so they skip the item.
 */
export async function marketDataFailure(
  item: string,
  error: MarketDataError,
  deps: Pick<ScanDeps, "sleep">,
): Promise<ItemOutcome> {
  if (error.type === "rate_limit") {
    const pauseMs = Math.min(error.retryAfterMs ?? DEFAULT_RATE_LIMIT_PAUSE_MS, MAX_RATE_LIMIT_PAUSE_MS);
    logger.warn("Scan: rate limited, skipping item", { item, pauseMs });
    await (deps.sleep ?? sleep)(pauseMs);
    return { kind: "skipped", item, reason: "rate_limited" };
  }

  if (isTransientMarketDataError(error)) {
    logger.warn("Scan: market data unavailable, skipping item", { item, error: error.type, message: error.message });
    return { kind: "skipped", item, reason: "unavailable" };
  }

  logger.error("Scan: market data failed", { item, error: error.type, message: error.message });
  return { kind: "failed", item, error: `${error.type}: ${error.message}` };
}
