/**
 * List Pending Alerts Usecase
 */

import { errAsync, type ResultAsync } from "neverthrow";
import type { AlertType, IsoDate } from "@dip-scanner/core";
import type { AlertDbError, AlertRepository } from "@dip-scanner/repositories";

export const PENDING_LIMIT_DEFAULT = 200;
export const PENDING_LIMIT_MAX = 500;

export interface PendingAlert {
  id: string;
  alertType: AlertType;
  symbol: string;
  asOf: IsoDate;
  message: string;
}

export type ListPendingAlertsError = AlertDbError | { type: "INVALID_LIMIT"; message: string };

export function listPendingAlerts(
  limit: number,
  deps: { alerts: AlertRepository },
): ResultAsync<PendingAlert[], ListPendingAlertsError> {
  if (!Number.isInteger(limit) || limit < 1 || limit > PENDING_LIMIT_MAX) {
    return errAsync({
      type: "INVALID_LIMIT" as const,
      message: `limit must be an integer between 1 and ${String(PENDING_LIMIT_MAX)}`,
    });
  }

  return deps.alerts
    .listPending(limit)
    .map(rows =>
      rows.map(a => ({ id: a.id, alertType: a.alertType, symbol: a.symbol, asOf: a.asOf, message: a.message })),
    );
}
