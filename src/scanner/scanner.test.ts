import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { DueScheduleScanner } from "./scanner.js";
import { ScheduleStore } from "../schedules/store.js";
import { RunStore } from "../runs/store.js";
import { RunDispatcher } from "../orchestrator/dispatcher.js";
import type { CreateScheduleInput } from "../schedules/types.js";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

const CREATED = new Date("2026-03-01T12:00:00.000Z");
const TICK = new Date("2026-03-02T09:00:30.000Z");

function scheduleInput(overrides: Partial<CreateScheduleInput> = {}): CreateScheduleInput {
  return {
    id: "daily-9",
    ownerId: "dev-user",
    prompt: "chip outlook",
    recurrence: { cadence: "daily", interval: 1, hour: 9, minute: 0 },
    nextRunAt: "2026-03-02T09:00:00.000Z",
    ...overrides,
  };
}

describe("DueScheduleScanner", () => {
  let db: Database.Database;
  let schedules: ScheduleStore;
  let runs: RunStore;
  let dispatcher: RunDispatcher;
  let executed: string[];
  let scanner: DueScheduleScanner;
  let ids: number;

  beforeEach(() => {
    db = new Database(":memory:");
    schedules = new ScheduleStore(db);
    runs = new RunStore(db);
    executed = [];
    ids = 0;
    dispatcher = new RunDispatcher(
      runs,
      {
        run: async (runId) => {
          executed.push(runId);
          return { runId, status: "succeeded", reportId: null, error: null, delivery: null };
        },
      },
      { concurrency: 3, newId: () => `run-${++ids}`, now: () => TICK },
    );
    scanner = new DueScheduleScanner(
      db,
      schedules,
      dispatcher,
      { schedule: "*/5 * * * *", timezone: "UTC", batchSize: 50 },
      () => TICK,
    );
  });

  afterEach(async () => {
    scanner.stop();
    await dispatcher.onIdle();
    db.close();
  });

  it("triggers a due daily schedule once and advances it to the next day", async () => {
    schedules.create(scheduleInput(), CREATED);

    const summary = scanner.scan(TICK);
    await dispatcher.onIdle();

    expect(summary).toEqual({ due: 1, triggered: 1, skipped: 0, failed: 0, runIds: ["run-1"] });
    expect(schedules.get("daily-9")?.nextRunAt).toBe("2026-03-03T09:00:00.000Z");
    expect(runs.get("run-1")?.scheduleId).toBe("daily-9");
    expect(executed).toEqual(["run-1"]);
  });

  it("does not trigger the same occurrence twice", () => {
    schedules.create(scheduleInput(), CREATED);

    scanner.scan(TICK);
    const second = scanner.scan(TICK);

    expect(second).toEqual({ due: 0, triggered: 0, skipped: 0, failed: 0, runIds: [] });
    expect(runs.list()).toHaveLength(1);
  });

  it("never selects inactive schedules", () => {
    schedules.create(scheduleInput({ active: false }), CREATED);

    const summary = scanner.scan(TICK);

    expect(summary.due).toBe(0);
    expect(runs.list()).toEqual([]);
  });

  it("skips a schedule whose version moved after it was read", () => {
    schedules.create(scheduleInput(), CREATED);
    const stale = schedules.listDue(TICK, 50);
    schedules.update("daily-9", { prompt: "edited meanwhile" });
    vi.spyOn(schedules, "listDue").mockReturnValueOnce(stale);

    const summary = scanner.scan(TICK);

    expect(summary).toEqual({ due: 1, triggered: 0, skipped: 1, failed: 0, runIds: [] });
    expect(runs.list()).toEqual([]);
    expect(schedules.get("daily-9")?.nextRunAt).toBe("2026-03-02T09:00:00.000Z");
  });

  it("rolls back the claim when creating the run fails and keeps scanning", () => {
    schedules.create(scheduleInput({ id: "a", nextRunAt: "2026-03-02T08:00:00.000Z" }), CREATED);
    schedules.create(scheduleInput({ id: "b", nextRunAt: "2026-03-02T08:30:00.000Z" }), CREATED);
    const createRun = dispatcher.createRun.bind(dispatcher);
    vi.spyOn(dispatcher, "createRun")
      .mockImplementationOnce(() => {
        throw new Error("disk full");
      })
      .mockImplementation(createRun);

    const summary = scanner.scan(TICK);

    expect(summary.due).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.triggered).toBe(1);
    expect(schedules.get("a")?.nextRunAt).toBe("2026-03-02T08:00:00.000Z");
    expect(schedules.get("b")?.nextRunAt).toBe("2026-03-03T09:00:00.000Z");
  });

  it("processes due schedules oldest first within the batch size", () => {
    const small = new DueScheduleScanner(
      db,
      schedules,
      dispatcher,
      { schedule: "*/5 * * * *", timezone: "UTC", batchSize: 1 },
      () => TICK,
    );
    schedules.create(scheduleInput({ id: "later", nextRunAt: "2026-03-02T08:59:00.000Z" }), CREATED);
    schedules.create(scheduleInput({ id: "earlier", nextRunAt: "2026-03-02T07:00:00.000Z" }), CREATED);

    small.scan(TICK);

    expect(runs.list().map((r) => r.scheduleId)).toEqual(["earlier"]);
  });

  it("tick swallows store errors so the timer keeps running", () => {
    vi.spyOn(schedules, "listDue").mockImplementationOnce(() => {
      throw new Error("database is locked");
    });

    expect(scanner.tick()).toBeNull();
  });

  it("tick scans at the injected time", () => {
    schedules.create(scheduleInput(), CREATED);

    expect(scanner.tick()?.triggered).toBe(1);
  });
});
