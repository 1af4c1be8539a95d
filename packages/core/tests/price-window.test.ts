import { describe, expect, test } from "vitest";

import { findCloseOn, findPricePair } from "../src/price-window";
import type { PriceBar } from "../src/types";

const window: PriceBar[] = [
  { date: "2025-01-15", close: "150.0" },
  { date: "2025-01-14", close: "148.0" },
  { date: "2025-01-13", close: "147.0" },
  { date: "2025-01-10", close: null },
  { date: "2025-01-09", close: "145.5" },
];

describe("findPricePair", () => {
  test("pairs the date with the next-older bar", () => {
    expect(findPricePair(window, "2025-01-15")).toEqual({ close: "150.0", prevClose: "148.0" });
  });

  test("skips weekends naturally because the window only holds trading days", () => {
    expect(findPricePair(window, "2025-01-13")).toBeNull(); // prev bar has no close
    expect(findPricePair(window, "2025-01-14")).toEqual({ close: "148.0", prevClose: "147.0" });
  });

  test("returns null for a date outside the window", () => {
    expect(findPricePair(window, "2025-01-18")).toBeNull();
  });

  test("returns null at the oldest edge of the window", () => {
    expect(findPricePair(window, "2025-01-09")).toBeNull();
  });

  test("returns null for an empty window", () => {
    expect(findPricePair([], "2025-01-15")).toBeNull();
  });
});

describe("findCloseOn", () => {
  test("returns the close for a date in the window", () => {
    expect(findCloseOn(window, "2025-01-14")).toBe("148.0");
  });

  test("returns null for a missing date or a bar without a close", () => {
    expect(findCloseOn(window, "2025-01-11")).toBeNull();
    expect(findCloseOn(window, "2025-01-10")).toBeNull();
  });
});
