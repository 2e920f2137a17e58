import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { ReportStore } from "./store.js";
import { reportIdForRun, type Report } from "./types.js";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

function makeReport(runId: string, overrides: Partial<Report> = {}): Report {
  return {
    id: reportIdForRun(runId),
    runId,
    scheduleId: "sched-1",
    ownerId: "dev-user",
    title: "Chips",
    prompt: "chips",
    symbols: ["NVDA"],
    summary: "Demand is strong.",
    blobPaths: { md: `dev-user/sched-1/${runId}/report.md`, html: `dev-user/sched-1/${runId}/report.html` },
    citations: [{ title: "A", url: "https://news.test/a" }],
    createdAt: "2026-03-02T09:00:00.000Z",
    ...overrides,
  };
}

describe("reportIdForRun", () => {
  it("derives the id from the run", () => {
    expect(reportIdForRun("run-1")).toBe("report-run-1");
  });
});

describe("ReportStore", () => {
  let db: Database.Database;
  let store: ReportStore;

  beforeEach(() => {
    db = new Database(":memory:");
    store = new ReportStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it("round-trips a report", () => {
    const saved = store.upsert(makeReport("run-1"));
    expect(saved).toEqual(makeReport("run-1"));
    expect(store.get("report-run-1")).toEqual(makeReport("run-1"));
  });

  it("overwrites on a second save but keeps the original creation time", () => {
    store.upsert(makeReport("run-1"));

    const second = store.upsert(
      makeReport("run-1", { title: "Chips v2", createdAt: "2026-03-02T09:10:00.000Z" }),
    );

    expect(store.count()).toBe(1);
    expect(second.title).toBe("Chips v2");
    expect(second.createdAt).toBe("2026-03-02T09:00:00.000Z");
  });

  it("rejects a report without a markdown document", () => {
    expect(() => store.upsert(makeReport("run-1", { blobPaths: { md: "" } }))).toThrow(
      "has no markdown document",
    );
  });

  it("scopes reads by owner", () => {
    store.upsert(makeReport("run-1"));
    expect(store.get("report-run-1", "other")).toBeUndefined();
    expect(store.get("report-run-1", "dev-user")?.id).toBe("report-run-1");
  });

  it("lists by owner and schedule, newest first", () => {
    store.upsert(makeReport("run-1", { createdAt: "2026-03-01T09:00:00.000Z" }));
    store.upsert(makeReport("run-2", { createdAt: "2026-03-02T09:00:00.000Z" }));
    store.upsert(makeReport("run-3", { scheduleId: "sched-2" }));
    store.upsert(makeReport("run-4", { ownerId: "other" }));

    expect(store.list({ ownerId: "dev-user", scheduleId: "sched-1" }).map((r) => r.id)).toEqual([
      "report-run-2",
      "report-run-1",
    ]);
  });

  it("finds reports created before a cutoff", () => {
    store.upsert(makeReport("old", { createdAt: "2026-01-01T00:00:00.000Z" }));
    store.upsert(makeReport("new", { createdAt: "2026-03-01T00:00:00.000Z" }));

    expect(store.listCreatedBefore(new Date("2026-02-01T00:00:00.000Z")).map((r) => r.id)).toEqual([
      "report-old",
    ]);
  });

  it("deletes a report", () => {
    store.upsert(makeReport("run-1"));
    expect(store.delete("report-run-1")).toBe(true);
    expect(store.delete("report-run-1")).toBe(false);
    expect(store.count()).toBe(0);
  });
});
