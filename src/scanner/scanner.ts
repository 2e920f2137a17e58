import { Cron } from "croner";
import type Database from "better-sqlite3";
import type { ScheduleStore } from "../schedules/store.js";
import type { Schedule } from "../schedules/types.js";
import type { Run } from "../runs/types.js";
import { computeNextRun } from "../recurrence/calculator.js";
import { inputFromSchedule, type RunDispatcher } from "../orchestrator/dispatcher.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("scanner");

export interface ScanSummary {
  /** Due schedules returned by the query. */
  due: number;
  /** Claimed schedules whose run was created and queued. */
  triggered: number;
  /** Claims lost to a concurrent writer. */
  skipped: number;
  /** Schedules that raised while being claimed. */
  failed: number;
  runIds: string[];
}

export interface ScannerOptions {
  schedule: string;
  timezone: string;
  batchSize: number;
}

/**
 * Periodically finds due schedules and starts one run per due occurrence.
 *
 * Each schedule is claimed by advancing its nextRunAt under the version it
 * was read with; the claim and the pending run are committed in the same
 * transaction. Only a successful claim leads to a run.
 */
export class DueScheduleScanner {
  private cron: Cron | null = null;

  constructor(
    private db: Database.Database,
    private schedules: ScheduleStore,
    private dispatcher: RunDispatcher,
    private options: ScannerOptions,
    private now: () => Date = () => new Date(),
  ) {}

  start(): void {
    if (this.cron) return;
    this.cron = new Cron(
      this.options.schedule,
      {
        timezone: this.options.timezone,
        protect: true, // a slow scan never overlaps the next tick
      },
      () => {
        this.tick();
      },
    );
    log.info(
      { schedule: this.options.schedule, next: this.cron.nextRun()?.toISOString() ?? null },
      "due-schedule scanner started",
    );
  }

  stop(): void {
    if (this.cron) {
      this.cron.stop();
      this.cron = null;
      log.info("due-schedule scanner stopped");
    }
  }

  /** One timer tick. Never throws; a failed tick is retried by the next one. */
  tick(): ScanSummary | null {
    try {
      return this.scan(this.now());
    } catch (e) {
      log.error({ err: e }, "scan failed");
      return null;
    }
  }

  scan(now: Date): ScanSummary {
    const due = this.schedules.listDue(now, this.options.batchSize);
    const summary: ScanSummary = { due: due.length, triggered: 0, skipped: 0, failed: 0, runIds: [] };

    for (const schedule of due) {
      let run: Run | null;
      try {
        run = this.claim(schedule, now);
      } catch (e) {
        summary.failed++;
        log.error({ scheduleId: schedule.id, err: e }, "failed to trigger schedule");
        continue;
      }

      if (!run) {
        summary.skipped++;
        log.debug({ scheduleId: schedule.id, version: schedule.version }, "claim lost, skipping");
        continue;
      }

      summary.triggered++;
      summary.runIds.push(run.id);
      this.dispatcher.launch(run.id);
    }

    if (summary.due > 0) {
      log.info(
        { due: summary.due, triggered: summary.triggered, skipped: summary.skipped, failed: summary.failed },
        "scan complete",
      );
    }
    return summary;
  }

  /** Advance nextRunAt and create the pending run atomically. Null when the claim is lost. */
  private claim(schedule: Schedule, now: Date): Run | null {
    const nextRunAt = computeNextRun(schedule.recurrence, now).toISOString();
    const claimAndCreate = this.db.transaction((): Run | null => {
      if (!this.schedules.claimNextRun(schedule.id, schedule.version, nextRunAt, now)) {
        return null;
      }
      return this.dispatcher.createRun(inputFromSchedule(schedule));
    });
    return claimAndCreate();
  }
}
