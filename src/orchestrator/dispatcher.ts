import { randomUUID } from "node:crypto";
import PQueue from "p-queue";
import type { RunStore } from "../runs/store.js";
import type { OrchestrationInput, Run } from "../runs/types.js";
import type { Schedule } from "../schedules/types.js";
import type { OrchestrationResult } from "./orchestrator.js";
import { normalizeRecipients, normalizeSymbols, requireSubject } from "../schedules/service.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("dispatcher");

/** Anything that can drive a run to completion. */
export interface RunExecutor {
  run(runId: string): Promise<OrchestrationResult>;
}

/** Ad-hoc research request, not tied to a schedule. */
export interface RunOnceRequest {
  ownerId: string;
  title?: string | null;
  prompt?: string;
  symbols?: string[];
  emailTo?: string[];
  attachPdf?: boolean;
  deepResearch?: boolean;
}

export function inputFromSchedule(schedule: Schedule): OrchestrationInput {
  return {
    scheduleId: schedule.id,
    ownerId: schedule.ownerId,
    title: schedule.title,
    prompt: schedule.prompt,
    symbols: schedule.symbols,
    emailTo: schedule.email.to,
    attachPdf: schedule.email.attachPdf,
    deepResearch: schedule.deepResearch,
  };
}

export interface DispatcherOptions {
  concurrency: number;
  newId?: () => string;
  now?: () => Date;
}

/**
 * Creates run records and executes them on a bounded queue. A run id is
 * queued at most once at a time.
 */
export class RunDispatcher {
  private queue: PQueue;
  private inFlight = new Set<string>();
  private newId: () => string;
  private now: () => Date;

  constructor(
    private runs: RunStore,
    private executor: RunExecutor,
    options: DispatcherOptions,
  ) {
    this.queue = new PQueue({ concurrency: Math.max(1, options.concurrency) });
    this.newId = options.newId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  /** Persist a pending run without executing it. */
  createRun(input: OrchestrationInput): Run {
    return this.runs.create(this.newId(), input, this.now());
  }

  /** Queue a run for execution. Errors are logged, never thrown. */
  launch(runId: string): void {
    if (this.inFlight.has(runId)) return;
    this.inFlight.add(runId);

    void this.queue
      .add(() => this.executor.run(runId))
      .then((result) => {
        if (result) {
          log.info({ runId, status: result.status, reportId: result.reportId }, "run complete");
        }
      })
      .catch((e: unknown) => {
        log.error({ runId, err: e }, "run crashed");
      })
      .finally(() => {
        this.inFlight.delete(runId);
      });
  }

  /** Trigger a schedule immediately. Does not touch its nextRunAt. */
  runNow(schedule: Schedule): Run {
    const run = this.createRun(inputFromSchedule(schedule));
    log.info({ runId: run.id, scheduleId: schedule.id }, "manual run");
    this.launch(run.id);
    return run;
  }

  runOnce(request: RunOnceRequest): Run {
    const prompt = request.prompt?.trim() ?? "";
    const symbols = normalizeSymbols(request.symbols ?? []);
    requireSubject(prompt, symbols);

    const run = this.createRun({
      scheduleId: null,
      ownerId: request.ownerId,
      title: request.title?.trim() || null,
      prompt,
      symbols,
      emailTo: normalizeRecipients(request.emailTo ?? []),
      attachPdf: request.attachPdf ?? false,
      deepResearch: request.deepResearch ?? false,
    });
    log.info({ runId: run.id }, "ad-hoc run");
    this.launch(run.id);
    return run;
  }

  /** Re-queue runs a previous process left pending or running. */
  resumeIncomplete(): number {
    const incomplete = this.runs.listIncomplete();
    for (const run of incomplete) {
      this.launch(run.id);
    }
    if (incomplete.length > 0) {
      log.info({ count: incomplete.length }, "resuming incomplete runs");
    }
    return incomplete.length;
  }

  /** Number of runs queued or executing. */
  activeCount(): number {
    return this.inFlight.size;
  }

  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }
}
