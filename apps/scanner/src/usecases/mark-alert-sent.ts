/**
 * Mark Alert Sent Usecase
 *
 * Idempotent: acknowledging an already-sent alert returns the original sent_at.
 */

import { errAsync, okAsync, type ResultAsync } from "neverthrow";
import type { AlertRepository, AlertRepositoryError } from "@dip-scanner/repositories";
import { logger } from "@dip-scanner/utils";

export interface MarkAlertSentResult {
  success: true;
  id: string;
  sentAt: Date;
}

export function markAlertSent(
  id: string,
  deps: { alerts: AlertRepository; clock: () => Date },
): ResultAsync<MarkAlertSentResult, AlertRepositoryError> {
  return deps.alerts.markSent(id, deps.clock()).andThen(alert => {
    if (alert.sentAt === null) {
      return errAsync<MarkAlertSentResult, AlertRepositoryError>({
        type: "DB_ERROR",
        message: `alert ${id} has no sent_at after update`,
      });
    }

    logger.info("Alert marked sent", { id, symbol: alert.symbol, sentAt: alert.sentAt.toISOString() });
    return okAsync<MarkAlertSentResult, AlertRepositoryError>({ success: true, id: alert.id, sentAt: alert.sentAt });
  });
}
