/**
 * Unit of Work
 *
 * Runs position and alert writes for one signal in a single transaction.
 * An Err returned by the work function rolls the transaction back.
 */

import type { ResultAsync } from "neverthrow";

import type { AlertRepository } from "./alert-repository";
import type { PositionRepository } from "./position-repository";

export interface TransactionalRepositories {
  positions: PositionRepository;
  alerts: AlertRepository;
}

export type UnitOfWorkError = { type: "DB_ERROR"; message: string };

export interface UnitOfWork {
  run<T, E>(
    work: (repos: TransactionalRepositories) => ResultAsync<T, E>,
  ): ResultAsync<T, E | UnitOfWorkError>;
}
