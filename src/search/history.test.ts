// pattern: Imperative Shell

import { describe, it, expect } from "vitest";
import { createHistoryEntry, createHistoryStore, formatTimestamp } from "./history.js";
import type { HistoryEntry, SearchRequest } from "./types.js";

function createRequest(productName: string): SearchRequest {
  return {
    category: "Vitamins",
    productName,
    techSpec: "2000 IU",
    priceCalcObjective: "unit",
    unitLabel: "tablet",
  };
}

function createEntry(productName: string, second: number): HistoryEntry {
  return createHistoryEntry(createRequest(productName), { status: "empty", products: [] }, new Date(2025, 0, 5, 9, 3, second));
}

describe("formatTimestamp", () => {
  it("formats local time with zero padding", () => {
    expect(formatTimestamp(new Date(2025, 0, 5, 9, 3, 7))).toBe("2025-01-05 09:03:07");
  });

  it("formats two-digit fields unchanged", () => {
    expect(formatTimestamp(new Date(2024, 11, 31, 23, 59, 58))).toBe("2024-12-31 23:59:58");
  });
});

describe("createHistoryEntry", () => {
  it("stamps the entry and freezes it", () => {
    const entry = createEntry("Vitamin D", 7);

    expect(entry.timestamp).toBe("2025-01-05 09:03:07");
    expect(entry.request.productName).toBe("Vitamin D");
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.request)).toBe(true);
    expect(Object.isFrozen(entry.outcome)).toBe(true);
  });

  it("keeps failure details of the outcome", () => {
    const entry = createHistoryEntry(
      createRequest("Vitamin C"),
      { status: "failed", products: [], failure: "transport", diagnostic: "API request failed: offline" },
      new Date(2025, 0, 5, 9, 3, 7)
    );

    expect(entry.outcome).toEqual({
      status: "failed",
      products: [],
      failure: "transport",
      diagnostic: "API request failed: offline",
    });
  });
});

describe("createHistoryStore", () => {
  it("starts empty", () => {
    const store = createHistoryStore();

    expect(store.size).toBe(0);
    expect(store.all()).toEqual([]);
  });

  it("returns N entries in append order after N appends", () => {
    const store = createHistoryStore();
    const names = ["A", "B", "C", "D", "E"];

    names.forEach((name, index) => store.append(createEntry(name, index)));

    expect(store.size).toBe(5);
    expect(store.all().map((entry) => entry.request.productName)).toEqual(names);
    expect(store.all().map((entry) => entry.timestamp)).toEqual([
      "2025-01-05 09:03:00",
      "2025-01-05 09:03:01",
      "2025-01-05 09:03:02",
      "2025-01-05 09:03:03",
      "2025-01-05 09:03:04",
    ]);
  });

  it("does not change previously returned snapshots when appending", () => {
    const store = createHistoryStore();
    store.append(createEntry("first", 1));
    const snapshot = store.all();
    const [first] = snapshot;

    store.append(createEntry("second", 2));

    expect(snapshot).toHaveLength(1);
    expect(first?.request.productName).toBe("first");
    expect(store.all()[0]).toEqual(first);
  });

  it("stores a copy so later changes to the caller's objects are not seen", () => {
    const store = createHistoryStore();
    const request = {
      category: "Vitamins",
      productName: "original",
      techSpec: "",
      priceCalcObjective: "none" as const,
    };
    store.append({ timestamp: "2025-01-05 09:03:07", request, outcome: { status: "empty", products: [] } });

    request.productName = "changed";

    const [stored] = store.all();
    expect(stored?.request.productName).toBe("original");
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored?.request)).toBe(true);
  });
});
