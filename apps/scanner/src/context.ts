/**
 * Application context
 *
 * Owns the DB pool and market data adapter for the lifetime of the process.
 * Built once by the entry point and closed on shutdown; nothing below it reaches
 * for process-wide state.
 */

import { FmpMarketDataAdapter, type FmpConfigInput } from "@dip-scanner/adapters";
import { closeDb, getDb } from "@dip-scanner/db";
import {
  createPostgresAlertRepository,
  createPostgresPositionRepository,
  createPostgresSymbolsCacheRepository,
  createPostgresUnitOfWork,
  type AlertRepository,
} from "@dip-scanner/repositories";
import { logger } from "@dip-scanner/utils";

import type { Env } from "./env";
import { createSymbolUniverseCache } from "./services/symbol-universe-cache";
import type { ScanDeps } from "./usecases";

export interface AppConfig {
  databaseUrl: string;
  fmp: FmpConfigInput;
  universeTtlMs: number;
}

/** What the use cases and HTTP handlers need */
export interface AppServices {
  scan: ScanDeps;
  alerts: AlertRepository;
  clock: () => Date;
}

export interface AppContext extends AppServices {
  close(): Promise<void>;
}

export function appConfigFromEnv(env: Env): AppConfig {
  return {
    databaseUrl: env.DATABASE_URL,
    fmp: {
      apiKey: env.FMP_API_KEY,
      baseUrl: env.FMP_BASE_URL,
      timeoutMs: env.FMP_TIMEOUT_MS,
      lookbackDays: env.PRICE_LOOKBACK_DAYS,
    },
    universeTtlMs: env.UNIVERSE_CACHE_TTL_HOURS * 3_600_000,
  };
}

export function createAppContext(config: AppConfig): AppContext {
  const db = getDb(config.databaseUrl);
  const marketData = new FmpMarketDataAdapter(config.fmp);
  const clock = (): Date => new Date();

  const scan: ScanDeps = {
    marketData,
    universe: createSymbolUniverseCache({ cache: createPostgresSymbolsCacheRepository(db), marketData }),
    positions: createPostgresPositionRepository(db),
    unitOfWork: createPostgresUnitOfWork(db),
    clock,
    universeTtlMs: config.universeTtlMs,
  };

  let closed = false;

  return {
    scan,
    alerts: createPostgresAlertRepository(db),
    clock,
    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      await closeDb(db);
      logger.info("Context closed");
    },
  };
}
