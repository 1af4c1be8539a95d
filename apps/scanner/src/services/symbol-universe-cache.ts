/**
 * Symbol Universe Cache
 *
 * Index constituents cached in symbols_cache. The snapshot is fresh while its
 * oldest row is younger than the TTL. On refresh failure (Err or empty list) a
 * stale snapshot is served rather than failing the scan.
 */

import { ResultAsync, okAsync } from "neverthrow";
import type { MarketDataPort } from "@dip-scanner/adapters";
import type { SymbolsCacheRepository, SymbolsCacheRepositoryError } from "@dip-scanner/repositories";
import { logger } from "@dip-scanner/utils";

export type UniverseSource = "cache" | "fresh" | "stale" | "empty";

export interface Universe {
  symbols: string[];
  source: UniverseSource;
}

export interface SymbolUniverseCacheDeps {
  cache: SymbolsCacheRepository;
  marketData: MarketDataPort;
}

export interface SymbolUniverseCache {
  getUniverse(now: Date, ttlMs: number): ResultAsync<Universe, SymbolsCacheRepositoryError>;
}

export function createSymbolUniverseCache(deps: SymbolUniverseCacheDeps): SymbolUniverseCache {
  const fetchFresh = (): ResultAsync<string[], never> =>
    deps.marketData.listIndexConstituents().orElse(error => {
      logger.warn("Universe: constituent fetch failed", { error: error.type, message: error.message });
      return okAsync<string[], never>([]);
    });

  return {
    getUniverse(now: Date, ttlMs: number): ResultAsync<Universe, SymbolsCacheRepositoryError> {
      return deps.cache.readAll().andThen(entries => {
        const cached = entries.map(e => e.symbol);
        const oldest = entries.reduce<number | null>(
          (min, e) => (min === null ? e.updatedAt.getTime() : Math.min(min, e.updatedAt.getTime())),
          null,
        );

        if (oldest !== null && now.getTime() - oldest < ttlMs) {
          logger.debug("Universe: cache hit", { symbols: cached.length });
          return okAsync<Universe, SymbolsCacheRepositoryError>({ symbols: cached, source: "cache" });
        }

        return fetchFresh().andThen(fresh => {
          if (fresh.length > 0) {
            return deps.cache
              .replaceAll(fresh, now)
              .map((): Universe => {
                logger.info("Universe: cache refreshed", { symbols: fresh.length });
                return { symbols: fresh, source: "fresh" };
              })
              .orElse(error => {
                // The fresh list is still usable for this run; next run retries the write
                logger.error("Universe: cache write failed", { message: error.message });
                return okAsync<Universe, SymbolsCacheRepositoryError>({ symbols: fresh, source: "fresh" });
              });
          }

          if (cached.length > 0) {
            logger.warn("Universe: serving stale cache", {
              symbols: cached.length,
              ageHours: oldest === null ? null : Math.round((now.getTime() - oldest) / 3_600_000),
            });
            return okAsync<Universe, SymbolsCacheRepositoryError>({ symbols: cached, source: "stale" });
          }

          logger.warn("Universe: no constituents available");
          return okAsync<Universe, SymbolsCacheRepositoryError>({ symbols: [], source: "empty" });
        });
      });
    },
  };
}
