/**
 * Symbols Cache Repository Interface
 */

import type { ResultAsync } from "neverthrow";
import type { SymbolsCacheRow } from "@dip-scanner/db";

export type SymbolsCacheRepositoryError = { type: "DB_ERROR"; message: string };

export type SymbolsCacheEntry = SymbolsCacheRow;

export interface SymbolsCacheRepository {
  readAll(): ResultAsync<SymbolsCacheEntry[], SymbolsCacheRepositoryError>;

  /**
   * Delete every row and insert `symbols` stamped with `now`, atomically.
   * Readers see either the previous snapshot or the new one, never a mix.
   */
  replaceAll(symbols: readonly string[], now: Date): ResultAsync<void, SymbolsCacheRepositoryError>;
}
