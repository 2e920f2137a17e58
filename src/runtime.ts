/**
 * Builds the long-lived components from a loaded config. Shared by the
 * `start`, `run` and `scan` commands so they all see the same wiring.
 */

import type Database from "better-sqlite3";
import { parseDuration, type ResearchConfig } from "./config.js";
import { openDatabase } from "./db.js";
import { ScheduleStore } from "./schedules/store.js";
import { ScheduleService } from "./schedules/service.js";
import { RunStore } from "./runs/store.js";
import { ReportStore } from "./reports/store.js";
import { ReportArchive } from "./reports/archive.js";
import { RetentionJob } from "./reports/retention.js";
import { createActivities } from "./activities/index.js";
import type { Activities } from "./activities/types.js";
import type { RetryPolicy } from "./activities/retry.js";
import { ResearchOrchestrator } from "./orchestrator/orchestrator.js";
import { RunDispatcher } from "./orchestrator/dispatcher.js";
import { DueScheduleScanner } from "./scanner/scanner.js";
import { ApiRouter } from "./api/router.js";
import { TrackedStockStore } from "./stocks/store.js";
import { ChartPriceProvider } from "./stocks/prices.js";
import type { PriceProvider } from "./stocks/types.js";

export interface Runtime {
  db: Database.Database;
  schedules: ScheduleStore;
  scheduleService: ScheduleService;
  runs: RunStore;
  reports: ReportStore;
  archive: ReportArchive;
  activities: Activities;
  orchestrator: ResearchOrchestrator;
  dispatcher: RunDispatcher;
  scanner: DueScheduleScanner;
  retention: RetentionJob;
  trackedStocks: TrackedStockStore;
  prices: PriceProvider;
  router: ApiRouter;
}

export function retryPolicyFromConfig(config: ResearchConfig["retry"]): RetryPolicy {
  return {
    maxAttempts: config.maxAttempts,
    initialDelayMs: parseDuration(config.initialDelay),
    maxDelayMs: parseDuration(config.maxDelay),
    timeoutMs: parseDuration(config.activityTimeout),
  };
}

export interface RuntimeOverrides {
  db?: Database.Database;
  activities?: Activities;
  prices?: PriceProvider;
  now?: () => Date;
  sleep?: (ms: number) => Promise<unknown>;
}

export function createRuntime(config: ResearchConfig, overrides: RuntimeOverrides = {}): Runtime {
  const now = overrides.now ?? (() => new Date());
  const db = overrides.db ?? openDatabase(config.storage.dataDir);

  const schedules = new ScheduleStore(db);
  const runs = new RunStore(db);
  const reports = new ReportStore(db);
  const archive = new ReportArchive(config.storage.reportsDir);
  const scheduleService = new ScheduleService(schedules, now);
  const trackedStocks = new TrackedStockStore(db);
  const prices = overrides.prices ?? new ChartPriceProvider(config.prices);

  const activities = overrides.activities ?? createActivities(config, { archive, reports });
  const orchestrator = new ResearchOrchestrator(runs, reports, activities, {
    retry: retryPolicyFromConfig(config.retry),
    now,
    sleep: overrides.sleep,
  });
  const dispatcher = new RunDispatcher(runs, orchestrator, {
    concurrency: config.scanner.maxConcurrent,
    now,
  });
  const scanner = new DueScheduleScanner(
    db,
    schedules,
    dispatcher,
    {
      schedule: config.scanner.schedule,
      timezone: config.scanner.timezone,
      batchSize: config.scanner.batchSize,
    },
    now,
  );
  const retention = new RetentionJob(
    { reports, archive },
    {
      days: config.retention.days,
      schedule: config.retention.schedule,
      timezone: config.scanner.timezone,
    },
    now,
  );
  const router = new ApiRouter({
    schedules,
    scheduleService,
    runs,
    reports,
    archive,
    dispatcher,
    email: activities,
    trackedStocks,
    prices,
    now,
  });

  return {
    db,
    schedules,
    scheduleService,
    runs,
    reports,
    archive,
    activities,
    orchestrator,
    dispatcher,
    scanner,
    retention,
    trackedStocks,
    prices,
    router,
  };
}
