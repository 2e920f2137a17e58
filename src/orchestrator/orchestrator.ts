import type { RunStore } from "../runs/store.js";
import type { ReportStore } from "../reports/store.js";
import type { RunCheckpoint, RunStage, RunStatus } from "../runs/types.js";
import type { Activities, DeliveryResult } from "../activities/types.js";
import { runActivity, DEFAULT_RETRY_POLICY, type ActivityOutcome, type RetryPolicy } from "../activities/retry.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("orchestrator");

const STAGE_LABELS: Partial<Record<RunStage, string>> = {
  fetching_context: "context fetch",
  synthesizing: "report synthesis",
  saving_report: "report save",
  sending_email: "email delivery",
};

const KIND_LABELS: Record<string, string> = {
  transient: "Transient",
  permanent: "Permanent",
};

const MAX_ERROR_MESSAGE = 200;

export interface OrchestrationResult {
  runId: string;
  status: RunStatus;
  reportId: string | null;
  error: string | null;
  delivery: DeliveryResult | null;
}

export interface OrchestratorOptions {
  retry?: RetryPolicy;
  now?: () => Date;
  /** Backoff sleep; tests pass a no-op. */
  sleep?: (ms: number) => Promise<unknown>;
}

/** Short, user-visible failure summary. Never carries a stack trace or provider body. */
export function failureSummary(stage: RunStage, outcome: { error: { kind: string; message: string }; attempts: number }): string {
  const kind = KIND_LABELS[outcome.error.kind] ?? "Internal";
  const label = STAGE_LABELS[stage] ?? stage;
  const after = outcome.attempts > 1 ? ` after ${outcome.attempts} attempts` : "";
  const firstLine = outcome.error.message.split("\n")[0];
  const message =
    firstLine.length > MAX_ERROR_MESSAGE ? `${firstLine.slice(0, MAX_ERROR_MESSAGE - 3)}...` : firstLine;
  return `${kind} error during ${label}${after}: ${message}`;
}

/**
 * Drives one run through fetch → synthesize → save → (email) → done.
 *
 * Every stage output is checkpointed on the run row together with the next
 * stage, so calling `run` again after a crash resumes from the first stage
 * that did not complete. A terminal run is returned as-is.
 */
export class ResearchOrchestrator {
  private retry: RetryPolicy;
  private now: () => Date;
  private sleep?: (ms: number) => Promise<unknown>;

  constructor(
    private runs: RunStore,
    private reports: ReportStore,
    private activities: Activities,
    options: OrchestratorOptions = {},
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep;
  }

  async run(runId: string): Promise<OrchestrationResult> {
    let checkpoint = this.load(runId);

    if (checkpoint.run.status === "pending") {
      this.runs.start(runId, this.now());
      checkpoint = this.load(runId);
    }

    while (checkpoint.run.status === "running") {
      const stage = checkpoint.run.stage;
      let progressed: boolean;
      try {
        progressed = await this.step(checkpoint);
      } catch (e) {
        this.abort(runId, stage, e);
        throw e;
      }
      if (!progressed) break;
      checkpoint = this.load(runId);
      log.debug({ runId, from: stage, to: checkpoint.run.stage }, "stage complete");
    }

    return toResult(this.load(runId));
  }

  /** Mark a run failed after an error outside the activity retry path. */
  private abort(runId: string, stage: RunStage, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    const summary = failureSummary(stage, { error: { kind: "internal", message }, attempts: 1 });
    log.error({ runId, stage, err: error }, "run aborted");
    try {
      this.runs.finish(runId, "failed", { error: summary }, this.now());
    } catch (e) {
      log.error({ runId, err: e }, "failed to record aborted run");
    }
  }

  /** Execute the checkpoint's current stage. Returns false when the run can make no further progress. */
  private async step(checkpoint: RunCheckpoint): Promise<boolean> {
    const { run, input } = checkpoint;

    switch (run.stage) {
      case "pending":
      case "fetching_context": {
        const outcome = await this.attempt("fetchContext", (signal) =>
          this.activities.fetchContext(input.prompt, input.symbols, signal),
        );
        if (!outcome.ok) return this.fail(run.id, "fetching_context", outcome);
        return this.runs.advance(run.id, "synthesizing", { context: outcome.value });
      }

      case "synthesizing": {
        const context = checkpoint.context;
        if (!context) return this.runs.advance(run.id, "fetching_context");
        const outcome = await this.attempt("synthesizeReport", (signal) =>
          this.activities.synthesizeReport(
            context,
            { prompt: input.prompt, symbols: input.symbols, deepResearch: input.deepResearch },
            signal,
          ),
        );
        if (!outcome.ok) return this.fail(run.id, "synthesizing", outcome);
        return this.runs.advance(run.id, "saving_report", { draft: outcome.value });
      }

      case "saving_report": {
        const draft = checkpoint.draft;
        if (!draft) return this.runs.advance(run.id, "synthesizing");
        const outcome = await this.attempt("saveReport", (signal) =>
          this.activities.saveReport(draft, { runId: run.id, input }, signal),
        );
        if (!outcome.ok) return this.fail(run.id, "saving_report", outcome);

        log.info({ runId: run.id, reportId: outcome.value.id }, "report saved");
        if (input.emailTo.length === 0) {
          this.runs.advance(run.id, "saving_report", { reportId: outcome.value.id });
          return this.runs.finish(run.id, "succeeded", {}, this.now());
        }
        return this.runs.advance(run.id, "sending_email", { reportId: outcome.value.id });
      }

      case "sending_email": {
        await this.deliver(checkpoint);
        return this.runs.finish(run.id, "succeeded", {}, this.now());
      }

      case "succeeded":
      case "failed":
        return false;
    }
  }

  /**
   * Send the report email at most once per run. The marker is claimed before
   * sending; a run whose marker is already set is never sent again.
   */
  private async deliver(checkpoint: RunCheckpoint): Promise<void> {
    const { run, input } = checkpoint;
    const report = run.reportId ? this.reports.get(run.reportId) : undefined;

    if (!report) {
      log.warn({ runId: run.id, reportId: run.reportId }, "report missing at delivery, skipping email");
      this.runs.recordDelivery(run.id, { sent: false, reason: "report not found" });
      return;
    }

    if (!this.runs.claimEmail(run.id)) {
      log.info({ runId: run.id }, "email already sent for run, not resending");
      return;
    }

    let delivery: DeliveryResult;
    try {
      delivery = await this.activities.sendEmail(report, input.emailTo, input.attachPdf);
    } catch (e) {
      delivery = { sent: false, error: e instanceof Error ? e.message : String(e) };
    }

    this.runs.recordDelivery(run.id, delivery);
    if (delivery.sent) {
      log.info({ runId: run.id, recipients: input.emailTo.length }, "report emailed");
    } else {
      log.warn({ runId: run.id, reason: delivery.reason, error: delivery.error }, "report email not sent");
    }
  }

  private attempt<T>(name: string, fn: (signal: AbortSignal) => Promise<T>): Promise<ActivityOutcome<T>> {
    return runActivity(name, fn, this.retry, this.sleep);
  }

  private fail(
    runId: string,
    stage: RunStage,
    outcome: Extract<ActivityOutcome<unknown>, { ok: false }>,
  ): boolean {
    const summary = failureSummary(stage, outcome);
    log.error({ runId, stage, attempts: outcome.attempts, err: outcome.error }, "run failed");
    this.runs.finish(runId, "failed", { error: summary }, this.now());
    return false;
  }

  private load(runId: string): RunCheckpoint {
    const checkpoint = this.runs.getCheckpoint(runId);
    if (!checkpoint) {
      throw new Error(`Run '${runId}' not found`);
    }
    return checkpoint;
  }
}

function toResult(checkpoint: RunCheckpoint): OrchestrationResult {
  return {
    runId: checkpoint.run.id,
    status: checkpoint.run.status,
    reportId: checkpoint.run.reportId,
    error: checkpoint.run.error,
    delivery: checkpoint.delivery,
  };
}
