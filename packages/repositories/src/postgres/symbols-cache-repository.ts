/**
 * Postgres Symbols Cache Repository
 */

import { asc } from "drizzle-orm";
import { ResultAsync } from "neverthrow";
import { symbolsCache, type DbExecutor } from "@dip-scanner/db";

import type {
  SymbolsCacheEntry,
  SymbolsCacheRepository,
  SymbolsCacheRepositoryError,
} from "../interfaces/symbols-cache-repository";
import { toDbError } from "./db-error";

export function createPostgresSymbolsCacheRepository(db: DbExecutor): SymbolsCacheRepository {
  return {
    readAll(): ResultAsync<SymbolsCacheEntry[], SymbolsCacheRepositoryError> {
      return ResultAsync.fromPromise(db.select().from(symbolsCache).orderBy(asc(symbolsCache.symbol)), toDbError);
    },

    replaceAll(symbols: readonly string[], now: Date): ResultAsync<void, SymbolsCacheRepositoryError> {
      const rows = [...new Set(symbols)].map(symbol => ({ symbol, updatedAt: now }));

      return ResultAsync.fromPromise(
        db.transaction(async tx => {
          await tx.delete(symbolsCache);
          if (rows.length > 0) {
            await tx.insert(symbolsCache).values(rows);
          }
        }),
        toDbError,
      );
    },
  };
}
