/**
 * Daily job scheduler
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import type { IntervalWorker } from "@dip-scanner/utils";

import { startDailyJobScheduler } from "../src/scheduler";
import { barsOf } from "./helpers/fake-market-data";
import { createTestHarness } from "./helpers/test-services";

describe("startDailyJobScheduler", () => {
  let worker: IntervalWorker | null = null;

  afterEach(async () => {
    await worker?.stop();
    worker = null;
  });

  it("should run the job immediately for the clock's UTC date", async () => {
    const h = createTestHarness(new Date("2025-03-04T23:30:00Z"));
    h.marketData.constituents = ["ACME"];
    h.marketData.earnings.set("2025-03-04", ["ACME"]);
    h.marketData.bars.set("ACME", barsOf(["2025-03-04", "88.00"], ["2025-03-03", "100.00"]));

    worker = startDailyJobScheduler(h.services.scan, 60_000);

    await vi.waitFor(() => {
      expect(h.store.alerts.map(a => a.eventKey)).toEqual(["ENTRY|ACME|2025-03-04"]);
    });
  });
});
