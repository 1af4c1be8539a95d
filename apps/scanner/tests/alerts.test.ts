/**
 * Alert retrieval and acknowledgement
 */

import { beforeEach, describe, expect, it } from "vitest";

import { listPendingAlerts, markAlertSent } from "../src/usecases";
import { createTestHarness, type TestHarness } from "./helpers/test-services";

describe("alert use cases", () => {
  let h: TestHarness;

  async function record(symbol: string, at: string): Promise<string> {
    h.setNow(new Date(at));
    await h.services.alerts.recordIfAbsent({
      eventKey: `ENTRY|${symbol}|2025-03-04`,
      alertType: "ENTRY",
      symbol,
      asOf: "2025-03-04",
      message: `[ENTRY] ${symbol} 2025-03-04`,
    });
    const row = h.store.alerts.find(a => a.symbol === symbol);
    return row ? row.id : "";
  }

  beforeEach(() => {
    h = createTestHarness();
  });

  describe("listPendingAlerts", () => {
    it("should return unsent alerts oldest first", async () => {
      await record("BBB", "2025-03-04T22:00:02Z");
      const first = await record("AAA", "2025-03-04T22:00:01Z");

      const pending = (await listPendingAlerts(200, h.services))._unsafeUnwrap();

      expect(pending.map(a => a.symbol)).toEqual(["AAA", "BBB"]);
      expect(pending[0]).toEqual({
        id: first,
        alertType: "ENTRY",
        symbol: "AAA",
        asOf: "2025-03-04",
        message: "[ENTRY] AAA 2025-03-04",
      });
    });

    it("should exclude sent alerts", async () => {
      const id = await record("AAA", "2025-03-04T22:00:01Z");
      await record("BBB", "2025-03-04T22:00:02Z");
      await markAlertSent(id, h.services);

      const pending = (await listPendingAlerts(200, h.services))._unsafeUnwrap();

      expect(pending.map(a => a.symbol)).toEqual(["BBB"]);
    });

    it.each([0, 501, 1.5])("should reject limit %s", async limit => {
      const result = await listPendingAlerts(limit, h.services);

      expect(result._unsafeUnwrapErr().type).toBe("INVALID_LIMIT");
    });

    it("should accept the bounds 1 and 500", async () => {
      await record("AAA", "2025-03-04T22:00:01Z");

      expect((await listPendingAlerts(1, h.services)).isOk()).toBe(true);
      expect((await listPendingAlerts(500, h.services)).isOk()).toBe(true);
    });
  });

  describe("markAlertSent", () => {
    it("should return the same sent_at on a repeated call", async () => {
      const id = await record("AAA", "2025-03-04T22:00:01Z");
      h.setNow(new Date("2025-03-05T08:00:00Z"));
      const first = (await markAlertSent(id, h.services))._unsafeUnwrap();

      h.setNow(new Date("2025-03-05T09:30:00Z"));
      const second = (await markAlertSent(id, h.services))._unsafeUnwrap();

      expect(first).toEqual({ success: true, id, sentAt: new Date("2025-03-05T08:00:00Z") });
      expect(second).toEqual(first);
    });

    it("should report NOT_FOUND for an unknown id", async () => {
      const result = await markAlertSent("3f8c2a8e-0000-4000-8000-000000000000", h.services);

      expect(result._unsafeUnwrapErr()).toEqual({ type: "NOT_FOUND", id: "3f8c2a8e-0000-4000-8000-000000000000" });
    });
  });
});
