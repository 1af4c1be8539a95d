/**
 * Postgres Unit of Work
 *
 * Repositories handed to the work function are bound to the transaction.
 * An Err from the work function triggers tx.rollback() and is returned as-is.
 */

import { ResultAsync } from "neverthrow";
import type { DbExecutor } from "@dip-scanner/db";

import type { TransactionalRepositories, UnitOfWork, UnitOfWorkError } from "../interfaces/unit-of-work";
import { createPostgresAlertRepository } from "./alert-repository";
import { toDbError } from "./db-error";
import { createPostgresPositionRepository } from "./position-repository";

export function createPostgresUnitOfWork(db: DbExecutor): UnitOfWork {
  return {
    run<T, E>(work: (repos: TransactionalRepositories) => ResultAsync<T, E>): ResultAsync<T, E | UnitOfWorkError> {
      let failure: { error: E } | null = null;

      return ResultAsync.fromPromise(
        db.transaction(async tx => {
          const result = await work({
            positions: createPostgresPositionRepository(tx),
            alerts: createPostgresAlertRepository(tx),
          });
          if (result.isErr()) {
            failure = { error: result.error };
            return tx.rollback();
          }
          return result.value;
        }),
        (e): E | UnitOfWorkError => (failure !== null ? failure.error : toDbError(e)),
      );
    },
  };
}
