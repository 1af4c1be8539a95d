/**
 * In-memory repository stand-ins
 *
 * Use-case tests rely on these enforcing the same uniqueness rules as the
 * database constraints, so the rules are pinned here.
 */

import { errAsync } from "neverthrow";
import { beforeEach, describe, expect, it } from "vitest";

import {
  createInMemoryAlertRepository,
  createInMemoryPositionRepository,
  createInMemoryStore,
  createInMemorySymbolsCacheRepository,
  createInMemoryUnitOfWork,
  type InMemoryStore,
} from "../src/testing";

const entryAlert = {
  eventKey: "ENTRY|ACME|2025-03-04",
  alertType: "ENTRY" as const,
  symbol: "ACME",
  asOf: "2025-03-04",
  message: "[ENTRY] ACME 2025-03-04",
};

describe("in-memory positions", () => {
  let store: InMemoryStore;

  beforeEach(() => {
    store = createInMemoryStore(() => new Date("2025-03-04T22:00:00Z"));
  });

  it("should keep one position per (symbol, entry_date)", async () => {
    const repo = createInMemoryPositionRepository(store);
    const input = { symbol: "ACME", entryDate: "2025-03-04", entryPrice: "88" };

    expect((await repo.openIfAbsent(input))._unsafeUnwrap()).toBe(true);
    expect((await repo.openIfAbsent(input))._unsafeUnwrap()).toBe(false);
    expect((await repo.openIfAbsent({ ...input, entryDate: "2025-03-05" }))._unsafeUnwrap()).toBe(true);
    expect(store.positions).toHaveLength(2);
  });

  it("should close once and drop the row from listOpen", async () => {
    const repo = createInMemoryPositionRepository(store);
    await repo.openIfAbsent({ symbol: "ACME", entryDate: "2025-03-04", entryPrice: "88" });
    const [open] = (await repo.listOpen())._unsafeUnwrap();
    const close = { id: open.id, exitDate: "2025-03-10", exitPrice: "79", exitReason: "STOP_LOSS" as const };
    const now = new Date("2025-03-10T22:00:00Z");

    expect((await repo.close(close, now))._unsafeUnwrap()).toBe(true);
    expect((await repo.close({ ...close, exitReason: "TIME_EXIT" }, now))._unsafeUnwrap()).toBe(false);
    expect((await repo.listOpen())._unsafeUnwrap()).toEqual([]);
    expect(store.positions[0]).toMatchObject({
      status: "CLOSED",
      exitDate: "2025-03-10",
      exitPrice: "79",
      exitReason: "STOP_LOSS",
      updatedAt: now,
    });
  });
});

describe("in-memory alerts", () => {
  it("should ignore a second insert with the same event key", async () => {
    const store = createInMemoryStore();
    const repo = createInMemoryAlertRepository(store);

    expect((await repo.recordIfAbsent(entryAlert))._unsafeUnwrap()).toBe(true);
    expect((await repo.recordIfAbsent({ ...entryAlert, message: "other" }))._unsafeUnwrap()).toBe(false);
    expect(store.alerts).toHaveLength(1);
    expect(store.alerts[0].message).toBe("[ENTRY] ACME 2025-03-04");
  });

  it("should list pending alerts oldest first and honour the limit", async () => {
    let tick = 0;
    const store = createInMemoryStore(() => new Date(Date.UTC(2025, 2, 4, 22, 0, tick++)));
    const repo = createInMemoryAlertRepository(store);
    await repo.recordIfAbsent({ ...entryAlert, eventKey: "k1", symbol: "AAA" });
    await repo.recordIfAbsent({ ...entryAlert, eventKey: "k2", symbol: "BBB" });
    await repo.recordIfAbsent({ ...entryAlert, eventKey: "k3", symbol: "CCC" });

    const pending = (await repo.listPending(2))._unsafeUnwrap();

    expect(pending.map(a => a.symbol)).toEqual(["AAA", "BBB"]);
  });

  it("should keep the first sent_at on repeated markSent", async () => {
    const store = createInMemoryStore();
    const repo = createInMemoryAlertRepository(store);
    await repo.recordIfAbsent(entryAlert);
    const id = store.alerts[0].id;
    const first = new Date("2025-03-05T08:00:00Z");

    const a = (await repo.markSent(id, first))._unsafeUnwrap();
    const b = (await repo.markSent(id, new Date("2025-03-05T09:00:00Z")))._unsafeUnwrap();

    expect(a.sentAt).toEqual(first);
    expect(b.sentAt).toEqual(first);
    expect((await repo.listPending(10))._unsafeUnwrap()).toEqual([]);
  });

  it("should return NOT_FOUND for an unknown id", async () => {
    const repo = createInMemoryAlertRepository(createInMemoryStore());

    const result = await repo.markSent("nope", new Date());

    expect(result._unsafeUnwrapErr()).toEqual({ type: "NOT_FOUND", id: "nope" });
  });
});

describe("in-memory symbols cache", () => {
  it("should replace the whole snapshot", async () => {
    const store = createInMemoryStore();
    const repo = createInMemorySymbolsCacheRepository(store);
    const t1 = new Date("2025-03-01T00:00:00Z");
    const t2 = new Date("2025-03-02T00:00:00Z");

    await repo.replaceAll(["AAA", "BBB"], t1);
    await repo.replaceAll(["CCC"], t2);

    expect((await repo.readAll())._unsafeUnwrap()).toEqual([{ symbol: "CCC", updatedAt: t2 }]);
  });
});

describe("in-memory unit of work", () => {
  it("should undo writes when the work returns Err", async () => {
    const store = createInMemoryStore();
    const uow = createInMemoryUnitOfWork(store);

    const result = await uow.run(({ positions }) =>
      positions
        .openIfAbsent({ symbol: "ACME", entryDate: "2025-03-04", entryPrice: "88" })
        .andThen(() => errAsync({ type: "DB_ERROR" as const, message: "alert insert failed" })),
    );

    expect(result.isErr()).toBe(true);
    expect(store.positions).toEqual([]);
  });
});
