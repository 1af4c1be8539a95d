/**
 * In-memory repositories
 *
 * Same contracts as the Postgres implementations, including the uniqueness
 * rules: (symbol, entry_date) for positions and event_key for alerts.
 */

import { ResultAsync, errAsync, okAsync } from "neverthrow";
import { v4 as uuidv4 } from "uuid";

import type {
  Alert,
  AlertDbError,
  AlertRepository,
  AlertRepositoryError,
  NewAlertInput,
} from "../interfaces/alert-repository";
import type {
  ClosePositionInput,
  OpenPositionInput,
  Position,
  PositionRepository,
  PositionRepositoryError,
} from "../interfaces/position-repository";
import type {
  SymbolsCacheEntry,
  SymbolsCacheRepository,
  SymbolsCacheRepositoryError,
} from "../interfaces/symbols-cache-repository";
import type { TransactionalRepositories, UnitOfWork, UnitOfWorkError } from "../interfaces/unit-of-work";
import type { InMemoryStore } from "./in-memory-store";

// ─────────────────────────────────────────────────────────────────────────────
// Positions
// ─────────────────────────────────────────────────────────────────────────────

export function createInMemoryPositionRepository(store: InMemoryStore): PositionRepository {
  return {
    openIfAbsent(input: OpenPositionInput): ResultAsync<boolean, PositionRepositoryError> {
      const exists = store.positions.some(p => p.symbol === input.symbol && p.entryDate === input.entryDate);
      if (exists) {
        return okAsync(false);
      }

      const now = store.clock();
      store.positions.push({
        id: uuidv4(),
        symbol: input.symbol,
        entryDate: input.entryDate,
        entryPrice: input.entryPrice,
        status: "OPEN",
        exitDate: null,
        exitPrice: null,
        exitReason: null,
        createdAt: now,
        updatedAt: now,
      });
      return okAsync(true);
    },

    listOpen(): ResultAsync<Position[], PositionRepositoryError> {
      const open = store.positions
        .filter(p => p.status === "OPEN")
        .map(p => ({ ...p }))
        .sort((a, b) => a.entryDate.localeCompare(b.entryDate) || a.symbol.localeCompare(b.symbol));
      return okAsync(open);
    },

    close(input: ClosePositionInput, now: Date): ResultAsync<boolean, PositionRepositoryError> {
      const position = store.positions.find(p => p.id === input.id && p.status === "OPEN");
      if (!position) {
        return okAsync(false);
      }

      position.status = "CLOSED";
      position.exitDate = input.exitDate;
      position.exitPrice = input.exitPrice;
      position.exitReason = input.exitReason;
      position.updatedAt = now;
      return okAsync(true);
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Alerts
// ─────────────────────────────────────────────────────────────────────────────

export function createInMemoryAlertRepository(store: InMemoryStore): AlertRepository {
  const findById = (id: string): ResultAsync<Alert, AlertRepositoryError> => {
    const alert = store.alerts.find(a => a.id === id);
    return alert ? okAsync({ ...alert }) : errAsync({ type: "NOT_FOUND" as const, id });
  };

  return {
    recordIfAbsent(input: NewAlertInput): ResultAsync<boolean, AlertDbError> {
      if (store.alerts.some(a => a.eventKey === input.eventKey)) {
        return okAsync(false);
      }

      store.alerts.push({
        id: uuidv4(),
        eventKey: input.eventKey,
        alertType: input.alertType,
        symbol: input.symbol,
        asOf: input.asOf,
        message: input.message,
        createdAt: store.clock(),
        sentAt: null,
      });
      return okAsync(true);
    },

    listPending(limit: number): ResultAsync<Alert[], AlertDbError> {
      // Array#sort is stable, so equal timestamps keep insertion order
      const pending = store.alerts
        .filter(a => a.sentAt === null)
        .map(a => ({ ...a }))
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
        .slice(0, limit);
      return okAsync(pending);
    },

    markSent(id: string, now: Date): ResultAsync<Alert, AlertRepositoryError> {
      const alert = store.alerts.find(a => a.id === id);
      if (alert && alert.sentAt === null) {
        alert.sentAt = now;
      }
      return findById(id);
    },

    findById,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Symbols cache
// ─────────────────────────────────────────────────────────────────────────────

export function createInMemorySymbolsCacheRepository(store: InMemoryStore): SymbolsCacheRepository {
  return {
    readAll(): ResultAsync<SymbolsCacheEntry[], SymbolsCacheRepositoryError> {
      const entries = store.symbols.map(e => ({ ...e })).sort((a, b) => a.symbol.localeCompare(b.symbol));
      return okAsync(entries);
    },

    replaceAll(symbols: readonly string[], now: Date): ResultAsync<void, SymbolsCacheRepositoryError> {
      const fresh = [...new Set(symbols)].map(symbol => ({ symbol, updatedAt: now }));
      store.symbols.splice(0, store.symbols.length, ...fresh);
      return okAsync(undefined);
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Unit of work
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Restores positions and alerts to their state before `work` when it returns Err.
 */
export function createInMemoryUnitOfWork(store: InMemoryStore): UnitOfWork {
  const repos: TransactionalRepositories = {
    positions: createInMemoryPositionRepository(store),
    alerts: createInMemoryAlertRepository(store),
  };

  return {
    run<T, E>(work: (repos: TransactionalRepositories) => ResultAsync<T, E>): ResultAsync<T, E | UnitOfWorkError> {
      const positions = store.positions.map(p => ({ ...p }));
      const alerts = store.alerts.map(a => ({ ...a }));

      return work(repos).mapErr((error): E | UnitOfWorkError => {
        store.positions.splice(0, store.positions.length, ...positions);
        store.alerts.splice(0, store.alerts.length, ...alerts);
        return error;
      });
    },
  };
}
