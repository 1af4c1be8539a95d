/**
 * Postgres Position Repository
 *
 * - openIfAbsent: INSERT ... ON CONFLICT (symbol, entry_date) DO NOTHING RETURNING id
 * - close: UPDATE guarded by status = 'OPEN'
 */

import { and, asc, eq } from "drizzle-orm";
import { ResultAsync } from "neverthrow";
import { positions, type DbExecutor } from "@dip-scanner/db";

import type {
  ClosePositionInput,
  OpenPositionInput,
  Position,
  PositionRepository,
  PositionRepositoryError,
} from "../interfaces/position-repository";
import { toDbError } from "./db-error";

export function createPostgresPositionRepository(db: DbExecutor): PositionRepository {
  return {
    openIfAbsent(input: OpenPositionInput): ResultAsync<boolean, PositionRepositoryError> {
      return ResultAsync.fromPromise(
        db
          .insert(positions)
          .values({
            symbol: input.symbol,
            entryDate: input.entryDate,
            entryPrice: input.entryPrice,
            status: "OPEN",
          })
          .onConflictDoNothing({ target: [positions.symbol, positions.entryDate] })
          .returning({ id: positions.id }),
        toDbError,
      ).map(rows => rows.length > 0);
    },

    listOpen(): ResultAsync<Position[], PositionRepositoryError> {
      return ResultAsync.fromPromise(
        db
          .select()
          .from(positions)
          .where(eq(positions.status, "OPEN"))
          .orderBy(asc(positions.entryDate), asc(positions.symbol)),
        toDbError,
      );
    },

    close(input: ClosePositionInput, now: Date): ResultAsync<boolean, PositionRepositoryError> {
      return ResultAsync.fromPromise(
        db
          .update(positions)
          .set({
            status: "CLOSED",
            exitDate: input.exitDate,
            exitPrice: input.exitPrice,
            exitReason: input.exitReason,
            updatedAt: now,
          })
          .where(and(eq(positions.id, input.id), eq(positions.status, "OPEN")))
          .returning({ id: positions.id }),
        toDbError,
      ).map(rows => rows.length > 0);
    },
  };
}
