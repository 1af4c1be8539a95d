/**
 * PositionRepository Unit Tests
 */

import { describe, expect, it } from "vitest";
import { positions } from "@dip-scanner/db";

import { createPostgresPositionRepository } from "../src/postgres/position-repository";
import { argsOf, createMockDb, methodsOf } from "./helpers/mock-db";

describe("PositionRepository.openIfAbsent", () => {
  const input = { symbol: "ACME", entryDate: "2025-03-04", entryPrice: "88" };

  it("should report inserted when a row comes back", async () => {
    const mock = createMockDb([[{ id: "pos-1" }]]);
    const repo = createPostgresPositionRepository(mock.db);

    const result = await repo.openIfAbsent(input);

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toBe(true);
    expect(methodsOf(mock.queries[0])).toEqual(["insert", "values", "onConflictDoNothing", "returning"]);
    expect(argsOf(mock.queries[0], "insert")[0]).toBe(positions);
    expect(argsOf(mock.queries[0], "values")[0]).toEqual({
      symbol: "ACME",
      entryDate: "2025-03-04",
      entryPrice: "88",
      status: "OPEN",
    });
  });

  it("should report not inserted on conflict", async () => {
    const mock = createMockDb([[]]);
    const repo = createPostgresPositionRepository(mock.db);

    const result = await repo.openIfAbsent(input);

    expect(result._unsafeUnwrap()).toBe(false);
  });

  it("should return Err with DB_ERROR on failure", async () => {
    const mock = createMockDb([new Error("connection refused")]);
    const repo = createPostgresPositionRepository(mock.db);

    const result = await repo.openIfAbsent(input);

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr()).toEqual({ type: "DB_ERROR", message: "connection refused" });
  });
});

describe("PositionRepository.listOpen", () => {
  it("should return the selected rows", async () => {
    const row = { id: "pos-1", symbol: "ACME", entryDate: "2025-03-04", status: "OPEN" };
    const mock = createMockDb([[row]]);
    const repo = createPostgresPositionRepository(mock.db);

    const result = await repo.listOpen();

    expect(result._unsafeUnwrap()).toEqual([row]);
    expect(methodsOf(mock.queries[0])).toEqual(["select", "from", "where", "orderBy"]);
  });
});

describe("PositionRepository.close", () => {
  const input = { id: "pos-1", exitDate: "2025-03-20", exitPrice: "79", exitReason: "STOP_LOSS" as const };
  const now = new Date("2025-03-20T21:00:00Z");

  it("should set all exit fields in one update", async () => {
    const mock = createMockDb([[{ id: "pos-1" }]]);
    const repo = createPostgresPositionRepository(mock.db);

    const result = await repo.close(input, now);

    expect(result._unsafeUnwrap()).toBe(true);
    expect(methodsOf(mock.queries[0])).toEqual(["update", "set", "where", "returning"]);
    expect(argsOf(mock.queries[0], "set")[0]).toEqual({
      status: "CLOSED",
      exitDate: "2025-03-20",
      exitPrice: "79",
      exitReason: "STOP_LOSS",
      updatedAt: now,
    });
  });

  it("should report false when the position is no longer open", async () => {
    const mock = createMockDb([[]]);
    const repo = createPostgresPositionRepository(mock.db);

    const result = await repo.close(input, now);

    expect(result._unsafeUnwrap()).toBe(false);
  });
});
