/**
 * Postgres Alert Repository
 *
 * - recordIfAbsent: INSERT ... ON CONFLICT (event_key) DO NOTHING RETURNING id
 * - markSent: conditional UPDATE on sent_at IS NULL; a miss re-reads the row
 *   to tell "already sent" apart from "unknown id"
 */

import { and, asc, eq, isNull } from "drizzle-orm";
import { ResultAsync, errAsync, okAsync } from "neverthrow";
import { alerts, type DbExecutor } from "@dip-scanner/db";

import type {
  Alert,
  AlertDbError,
  AlertRepository,
  AlertRepositoryError,
  NewAlertInput,
} from "../interfaces/alert-repository";
import { toDbError } from "./db-error";

export function createPostgresAlertRepository(db: DbExecutor): AlertRepository {
  const findById = (id: string): ResultAsync<Alert, AlertRepositoryError> =>
    ResultAsync.fromPromise(db.select().from(alerts).where(eq(alerts.id, id)).limit(1), toDbError).andThen(rows => {
      const row = rows.at(0);
      return row ? okAsync(row) : errAsync({ type: "NOT_FOUND" as const, id });
    });

  return {
    recordIfAbsent(input: NewAlertInput): ResultAsync<boolean, AlertDbError> {
      return ResultAsync.fromPromise(
        db
          .insert(alerts)
          .values({
            eventKey: input.eventKey,
            alertType: input.alertType,
            symbol: input.symbol,
            asOf: input.asOf,
            message: input.message,
          })
          .onConflictDoNothing({ target: alerts.eventKey })
          .returning({ id: alerts.id }),
        toDbError,
      ).map(rows => rows.length > 0);
    },

    listPending(limit: number): ResultAsync<Alert[], AlertDbError> {
      return ResultAsync.fromPromise(
        db
          .select()
          .from(alerts)
          .where(isNull(alerts.sentAt))
          .orderBy(asc(alerts.createdAt), asc(alerts.id))
          .limit(limit),
        toDbError,
      );
    },

    markSent(id: string, now: Date): ResultAsync<Alert, AlertRepositoryError> {
      return ResultAsync.fromPromise(
        db
          .update(alerts)
          .set({ sentAt: now })
          .where(and(eq(alerts.id, id), isNull(alerts.sentAt)))
          .returning(),
        toDbError,
      ).andThen(rows => {
        const updated = rows.at(0);
        return updated ? okAsync<Alert, AlertRepositoryError>(updated) : findById(id);
      });
    },

    findById,
  };
}
