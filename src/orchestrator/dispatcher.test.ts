import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { RunDispatcher, inputFromSchedule, type RunExecutor } from "./dispatcher.js";
import { RunStore } from "../runs/store.js";
import { ScheduleStore } from "../schedules/store.js";
import { ScheduleValidationError } from "../schedules/service.js";
import type { OrchestrationResult } from "./orchestrator.js";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

const NOW = new Date("2026-03-02T09:00:00.000Z");

/** Wait for the queue and the bookkeeping chained after each task. */
async function settle(dispatcher: RunDispatcher): Promise<void> {
  await dispatcher.onIdle();
  await new Promise((resolve) => setImmediate(resolve));
}

describe("RunDispatcher", () => {
  let db: Database.Database;
  let runs: RunStore;
  let schedules: ScheduleStore;
  let executed: string[];
  let executor: RunExecutor;
  let dispatcher: RunDispatcher;
  let ids: number;

  beforeEach(() => {
    db = new Database(":memory:");
    runs = new RunStore(db);
    schedules = new ScheduleStore(db);
    executed = [];
    ids = 0;
    executor = {
      run: vi.fn(async (runId: string): Promise<OrchestrationResult> => {
        executed.push(runId);
        return { runId, status: "succeeded", reportId: `report-${runId}`, error: null, delivery: null };
      }),
    };
    dispatcher = new RunDispatcher(runs, executor, {
      concurrency: 2,
      newId: () => `run-${++ids}`,
      now: () => NOW,
    });
  });

  afterEach(() => {
    db.close();
  });

  function createSchedule() {
    return schedules.create(
      {
        id: "sched-1",
        ownerId: "dev-user",
        title: "Chips",
        prompt: "chip outlook",
        symbols: ["NVDA"],
        recurrence: { cadence: "daily", interval: 1, hour: 9, minute: 0 },
        email: { to: ["a@test.local"], attachPdf: true },
        nextRunAt: "2026-03-03T09:00:00.000Z",
      },
      NOW,
    );
  }

  it("maps a schedule to an orchestration input", () => {
    expect(inputFromSchedule(createSchedule())).toEqual({
      scheduleId: "sched-1",
      ownerId: "dev-user",
      title: "Chips",
      prompt: "chip outlook",
      symbols: ["NVDA"],
      emailTo: ["a@test.local"],
      attachPdf: true,
      deepResearch: false,
    });
  });

  it("runNow creates and executes a run without moving nextRunAt", async () => {
    const schedule = createSchedule();

    const run = dispatcher.runNow(schedule);
    await settle(dispatcher);

    expect(run.id).toBe("run-1");
    expect(run.scheduleId).toBe("sched-1");
    expect(executed).toEqual(["run-1"]);
    expect(schedules.get("sched-1")?.nextRunAt).toBe("2026-03-03T09:00:00.000Z");
  });

  it("runOnce normalizes the request into an ad-hoc run", async () => {
    const run = dispatcher.runOnce({ ownerId: "dev-user", prompt: " memory market ", symbols: ["mu"], emailTo: [" "] });
    await settle(dispatcher);

    expect(run.scheduleId).toBeNull();
    expect(runs.getCheckpoint(run.id)?.input).toEqual({
      scheduleId: null,
      ownerId: "dev-user",
      title: null,
      prompt: "memory market",
      symbols: ["MU"],
      emailTo: [],
      attachPdf: false,
      deepResearch: false,
    });
    expect(executed).toEqual([run.id]);
  });

  it("runOnce rejects an empty request", () => {
    expect(() => dispatcher.runOnce({ ownerId: "dev-user" })).toThrow(ScheduleValidationError);
    expect(runs.list()).toEqual([]);
  });

  it("does not queue the same run twice while in flight", async () => {
    const run = dispatcher.createRun(inputFromSchedule(createSchedule()));

    dispatcher.launch(run.id);
    dispatcher.launch(run.id);
    await settle(dispatcher);

    expect(executed).toEqual([run.id]);
    expect(dispatcher.activeCount()).toBe(0);
  });

  it("logs and survives an executor crash", async () => {
    vi.mocked(executor.run).mockRejectedValueOnce(new Error("db closed"));
    const run = dispatcher.createRun(inputFromSchedule(createSchedule()));

    dispatcher.launch(run.id);
    await settle(dispatcher);

    expect(dispatcher.activeCount()).toBe(0);
  });

  it("resumes pending and running runs from a previous process", async () => {
    const input = inputFromSchedule(createSchedule());
    runs.create("old-pending", input, NOW);
    runs.create("old-running", input, NOW);
    runs.start("old-running", NOW);
    runs.create("old-done", input, NOW);
    runs.start("old-done", NOW);
    runs.finish("old-done", "succeeded", {}, NOW);

    const resumed = dispatcher.resumeIncomplete();
    await settle(dispatcher);

    expect(resumed).toBe(2);
    expect([...executed].sort()).toEqual(["old-pending", "old-running"]);
  });
});
