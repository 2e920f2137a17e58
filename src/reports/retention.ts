import { Cron } from "croner";
import type { ReportStore } from "./store.js";
import type { ReportArchive } from "./archive.js";
import type { Report } from "./types.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("retention");

const DAY_MS = 86_400_000;

export interface ReportDeps {
  reports: ReportStore;
  archive: ReportArchive;
}

/** Remove a report's documents, then its row. */
export async function deleteReport(report: Report, deps: ReportDeps): Promise<void> {
  await deps.archive.remove(report.blobPaths);
  deps.reports.delete(report.id);
}

/**
 * Delete reports created more than `days` days before `now`.
 * `days <= 0` disables retention. Returns the number of reports deleted.
 */
export async function pruneExpiredReports(now: Date, days: number, deps: ReportDeps): Promise<number> {
  if (days <= 0) return 0;

  const cutoff = new Date(now.getTime() - days * DAY_MS);
  let deleted = 0;
  for (const report of deps.reports.listCreatedBefore(cutoff)) {
    try {
      await deleteReport(report, deps);
      deleted++;
    } catch (e) {
      log.error({ reportId: report.id, err: e }, "failed to delete expired report");
    }
  }

  if (deleted > 0) {
    log.info({ deleted, cutoff: cutoff.toISOString() }, "expired reports deleted");
  }
  return deleted;
}

/** Runs pruneExpiredReports on a cron schedule. */
export class RetentionJob {
  private cron: Cron | null = null;

  constructor(
    private deps: ReportDeps,
    private options: { days: number; schedule: string; timezone: string },
    private now: () => Date = () => new Date(),
  ) {}

  start(): void {
    if (this.options.days <= 0) {
      log.info("report retention disabled");
      return;
    }
    this.cron = new Cron(this.options.schedule, { timezone: this.options.timezone, protect: true }, async () => {
      await this.runOnce();
    });
    log.info({ days: this.options.days, schedule: this.options.schedule }, "report retention scheduled");
  }

  stop(): void {
    this.cron?.stop();
    this.cron = null;
  }

  async runOnce(): Promise<number> {
    try {
      return await pruneExpiredReports(this.now(), this.options.days, this.deps);
    } catch (e) {
      log.error({ err: e }, "retention run failed");
      return 0;
    }
  }
}
