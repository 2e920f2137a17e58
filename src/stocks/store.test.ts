import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { TrackedStockStore } from "./store.js";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

const NOW = new Date("2026-03-02T09:00:00.000Z");

describe("TrackedStockStore", () => {
  let db: Database.Database;
  let store: TrackedStockStore;

  beforeEach(() => {
    db = new Database(":memory:");
    store = new TrackedStockStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it("creates and reads back a stock", () => {
    const stock = store.create(
      {
        id: "s-1",
        ownerId: "dev-user",
        symbol: "RELIANCE",
        exchange: "NSE",
        reportTitle: "India energy",
        recommendationDate: "2026-02-20",
        recommendationPrice: 2950.25,
      },
      NOW,
    );

    expect(stock).toEqual({
      id: "s-1",
      ownerId: "dev-user",
      symbol: "RELIANCE",
      exchange: "NSE",
      reportId: null,
      reportTitle: "India energy",
      recommendationDate: "2026-02-20",
      recommendationPrice: 2950.25,
      createdAt: NOW.toISOString(),
    });
    expect(store.get("s-1", "other")).toBeUndefined();
  });

  it("lists an owner's stocks by symbol then date", () => {
    const base = { ownerId: "dev-user", recommendationPrice: 10 };
    store.create({ ...base, id: "a", symbol: "NVDA", recommendationDate: "2026-02-01" }, NOW);
    store.create({ ...base, id: "b", symbol: "AAPL", recommendationDate: "2026-02-03" }, NOW);
    store.create({ ...base, id: "c", symbol: "AAPL", recommendationDate: "2026-01-15" }, NOW);
    store.create({ ...base, id: "d", symbol: "MSFT", recommendationDate: "2026-01-15", ownerId: "other" }, NOW);

    expect(store.list("dev-user").map((s) => s.id)).toEqual(["c", "b", "a"]);
  });

  it("deletes only within the owner", () => {
    store.create(
      { id: "s-1", ownerId: "dev-user", symbol: "NVDA", recommendationDate: "2026-02-01", recommendationPrice: 1 },
      NOW,
    );

    expect(store.delete("s-1", "other")).toBe(false);
    expect(store.delete("s-1", "dev-user")).toBe(true);
    expect(store.get("s-1")).toBeUndefined();
  });
});
