/**
 * Scan Exits Usecase
 *
 * Open positions are read once per scan, so each position is closed at most
 * once per run. Close + alert share a transaction per position.
 */

import { ResultAsync, okAsync } from "neverthrow";
import { daysBetween, evaluateExit, exitEventKey, formatExitMessage, type IsoDate } from "@dip-scanner/core";
import type { AlertDbError, Position, PositionRepositoryError } from "@dip-scanner/repositories";
import { logger } from "@dip-scanner/utils";

import { describeError, summarizeOutcomes, type ItemOutcome, type ScanSummary } from "./item-outcome";
import { marketDataFailure, type ScanDeps } from "./scan-deps";

export type ScanExitsError = PositionRepositoryError;

/** What the close + alert transaction did */
type ExitWrite = "alerted" | "already_recorded" | "already_closed";

export function scanExits(asOf: IsoDate, deps: ScanDeps): ResultAsync<ScanSummary, ScanExitsError> {
  return deps.positions.listOpen().andThen(open => {
    logger.info("Exit scan: open positions", { asOf, count: open.length });
    return ResultAsync.fromSafePromise(processPositions(open, asOf, deps));
  });
}

async function processPositions(open: readonly Position[], asOf: IsoDate, deps: ScanDeps): Promise<ScanSummary> {
  const outcomes: ItemOutcome[] = [];
  for (const position of open) {
    try {
      outcomes.push(await processPosition(position, asOf, deps));
    } catch (error) {
      logger.error("Exit scan: position failed", { positionId: position.id, symbol: position.symbol, error });
      outcomes.push({ kind: "failed", item: position.id, error: describeError(error) });
    }
  }

  const summary = summarizeOutcomes(outcomes);
  logger.info("Exit scan: done", { asOf, ...summary });
  return summary;
}

async function processPosition(position: Position, asOf: IsoDate, deps: ScanDeps): Promise<ItemOutcome> {
  const { id, symbol, entryDate, entryPrice } = position;

  // a replayed earlier date never closes a position entered after it
  if (daysBetween(entryDate, asOf) < 0) {
    logger.debug("Exit scan: as-of precedes entry", { symbol, entryDate, asOf });
    return { kind: "skipped", item: id, reason: "before_entry" };
  }

  const close = await deps.marketData.closeOn(symbol, asOf);
  if (close.isErr()) {
    return marketDataFailure(id, close.error, deps);
  }
  if (close.value === null) {
    logger.debug("Exit scan: no close", { symbol, asOf });
    return { kind: "skipped", item: id, reason: "no_price" };
  }

  const signal = evaluateExit(entryPrice, close.value, entryDate, asOf);
  if (!signal) {
    return { kind: "no_signal", item: id };
  }

  const eventKey = exitEventKey(symbol, entryDate, asOf, signal.reason);
  const now = deps.clock();
  const written = await deps.unitOfWork.run(({ positions, alerts }) =>
    positions
      .close({ id, exitDate: asOf, exitPrice: signal.exitPrice, exitReason: signal.reason }, now)
      .andThen((closed): ResultAsync<ExitWrite, PositionRepositoryError | AlertDbError> => {
        // closed by an overlapping run since listOpen(); its alert already describes the close
        if (!closed) return okAsync<ExitWrite, never>("already_closed");
        return alerts
          .recordIfAbsent({
            eventKey,
            alertType: "EXIT",
            symbol,
            asOf,
            message: formatExitMessage(symbol, asOf, signal),
          })
          .map((inserted): ExitWrite => (inserted ? "alerted" : "already_recorded"));
      }),
  );

  if (written.isErr()) {
    logger.error("Exit scan: persist failed", { symbol, eventKey, message: written.error.message });
    return { kind: "failed", item: id, error: written.error.message };
  }

  if (written.value === "already_closed") {
    logger.info("Exit scan: position already closed", { symbol, positionId: id, asOf });
    return { kind: "skipped", item: id, reason: "already_closed" };
  }

  if (written.value === "alerted") {
    logger.info("Exit signal recorded", { symbol, reason: signal.reason, pnl: signal.pnl, holdingDays: signal.holdingDays });
    return { kind: "alerted", item: id, eventKey };
  }
  return { kind: "already_recorded", item: id, eventKey };
}
