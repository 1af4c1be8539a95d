/**
 * Alert Repository Interface
 *
 * The alerts table is an outbox: rows are created once per event key and
 * acknowledged once by the external notifier.
 */

import type { ResultAsync } from "neverthrow";
import type { AlertType, IsoDate } from "@dip-scanner/core";
import type { AlertRow } from "@dip-scanner/db";

export type AlertDbError = { type: "DB_ERROR"; message: string };

export type AlertRepositoryError = AlertDbError | { type: "NOT_FOUND"; id: string };

export type Alert = AlertRow;

export interface NewAlertInput {
  eventKey: string;
  alertType: AlertType;
  symbol: string;
  asOf: IsoDate;
  message: string;
}

export interface AlertRepository {
  /**
   * Insert unless eventKey already exists.
   * The returned flag is the authoritative "new alert" signal for scan counters.
   */
  recordIfAbsent(input: NewAlertInput): ResultAsync<boolean, AlertDbError>;

  /** Unsent alerts, oldest first */
  listPending(limit: number): ResultAsync<Alert[], AlertDbError>;

  /**
   * Stamp sent_at. An alert that is already sent is returned unchanged.
   */
  markSent(id: string, now: Date): ResultAsync<Alert, AlertRepositoryError>;

  findById(id: string): ResultAsync<Alert, AlertRepositoryError>;
}
