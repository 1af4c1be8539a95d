/**
 * Position Repository Interface
 *
 * - One position per (symbol, entry_date), enforced by the storage constraint
 * - OPEN -> CLOSED happens once; a closed row is never touched again
 */

import type { ResultAsync } from "neverthrow";
import type { ExitReason, IsoDate, PriceStr } from "@dip-scanner/core";
import type { PositionRow } from "@dip-scanner/db";

export type PositionRepositoryError = {
  type: "DB_ERROR";
  message: string;
};

export type Position = PositionRow;

export interface OpenPositionInput {
  symbol: string;
  entryDate: IsoDate;
  entryPrice: PriceStr;
}

export interface ClosePositionInput {
  id: string;
  exitDate: IsoDate;
  exitPrice: PriceStr;
  exitReason: ExitReason;
}

export interface PositionRepository {
  /**
   * Insert an OPEN position unless one already exists for (symbol, entryDate).
   * Resolves to true only when this call created the row.
   */
  openIfAbsent(input: OpenPositionInput): ResultAsync<boolean, PositionRepositoryError>;

  /** All OPEN positions, oldest entry first */
  listOpen(): ResultAsync<Position[], PositionRepositoryError>;

  /**
   * Set status=CLOSED with all exit fields in one statement.
   * Resolves to false when the row was already closed (or does not exist).
   */
  close(input: ClosePositionInput, now: Date): ResultAsync<boolean, PositionRepositoryError>;
}
