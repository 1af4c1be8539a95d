/**
 * Scan Entries Usecase
 *
 * universe ∩ earnings(asOf) -> price pair -> entry rule -> position + alert.
 * Each candidate commits its own transaction; a failed candidate is logged
 * and the loop moves on.
 */

import { ResultAsync, okAsync } from "neverthrow";
import { entryEventKey, evaluateEntry, formatEntryMessage, type IsoDate } from "@dip-scanner/core";
import type { SymbolsCacheRepositoryError } from "@dip-scanner/repositories";
import { logger } from "@dip-scanner/utils";

import { EMPTY_SUMMARY, describeError, summarizeOutcomes, type ItemOutcome, type ScanSummary } from "./item-outcome";
import { marketDataFailure, type ScanDeps } from "./scan-deps";

export type ScanEntriesError = SymbolsCacheRepositoryError;

export function scanEntries(asOf: IsoDate, deps: ScanDeps): ResultAsync<ScanSummary, ScanEntriesError> {
  return deps.universe.getUniverse(deps.clock(), deps.universeTtlMs).andThen(universe => {
    if (universe.symbols.length === 0) {
      logger.warn("Entry scan: empty universe, nothing to do", { asOf });
      return okAsync<ScanSummary, ScanEntriesError>(EMPTY_SUMMARY);
    }

    return deps.marketData
      .earningsOn(asOf)
      .orElse(error => {
        logger.error("Entry scan: earnings calendar unavailable", { asOf, error: error.type, message: error.message });
        return okAsync<string[], never>([]);
      })
      .andThen(earnings => {
        const members = new Set(universe.symbols);
        const candidates = earnings.filter(symbol => members.has(symbol));
        logger.info("Entry scan: candidates", {
          asOf,
          universe: members.size,
          earnings: earnings.length,
          candidates: candidates.length,
        });

        return ResultAsync.fromSafePromise(processCandidates(candidates, asOf, deps));
      });
  });
}

async function processCandidates(candidates: readonly string[], asOf: IsoDate, deps: ScanDeps): Promise<ScanSummary> {
  const outcomes: ItemOutcome[] = [];
  for (const symbol of candidates) {
    try {
      outcomes.push(await processCandidate(symbol, asOf, deps));
    } catch (error) {
      logger.error("Entry scan: candidate failed", { symbol, error });
      outcomes.push({ kind: "failed", item: symbol, error: describeError(error) });
    }
  }

  const summary = summarizeOutcomes(outcomes);
  logger.info("Entry scan: done", { asOf, ...summary });
  return summary;
}

async function processCandidate(symbol: string, asOf: IsoDate, deps: ScanDeps): Promise<ItemOutcome> {
  const prices = await deps.marketData.priceAndPrevClose(symbol, asOf);
  if (prices.isErr()) {
    return marketDataFailure(symbol, prices.error, deps);
  }
  if (prices.value === null) {
    logger.debug("Entry scan: no price pair", { symbol, asOf });
    return { kind: "skipped", item: symbol, reason: "no_price" };
  }

  const signal = evaluateEntry(prices.value.close, prices.value.prevClose);
  if (!signal) {
    return { kind: "no_signal", item: symbol };
  }

  const eventKey = entryEventKey(symbol, asOf);
  const recorded = await deps.unitOfWork.run(({ positions, alerts }) =>
    positions
      .openIfAbsent({ symbol, entryDate: asOf, entryPrice: signal.entryPrice })
      .andThen(() =>
        alerts.recordIfAbsent({
          eventKey,
          alertType: "ENTRY",
          symbol,
          asOf,
          message: formatEntryMessage(symbol, asOf, signal),
        }),
      ),
  );

  if (recorded.isErr()) {
    logger.error("Entry scan: persist failed", { symbol, eventKey, message: recorded.error.message });
    return { kind: "failed", item: symbol, error: recorded.error.message };
  }

  if (recorded.value) {
    logger.info("Entry signal recorded", { symbol, asOf, earningsReturn: signal.earningsReturn });
    return { kind: "alerted", item: symbol, eventKey };
  }
  return { kind: "already_recorded", item: symbol, eventKey };
}
