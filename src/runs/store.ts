/**
 * RunStore -- SQLite-backed run records.
 *
 * A run row doubles as the orchestration checkpoint: the current stage and
 * every stage output so far live on the same row, so each transition is one
 * atomic UPDATE. Status writes are guarded in SQL and can never move a run
 * backwards.
 */

import type Database from "better-sqlite3";
import { z } from "zod";
import {
  canTransition,
  type Run,
  type RunRow,
  type RunStage,
  type RunStatus,
  type RunCheckpoint,
  type OrchestrationInput,
} from "./types.js";
import {
  ContextBundleSchema,
  ReportDraftSchema,
  DeliveryResultSchema,
  type ContextBundle,
  type ReportDraft,
  type DeliveryResult,
} from "../activities/types.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("run-store");

const ALL_STATUSES: readonly RunStatus[] = ["pending", "running", "succeeded", "failed"];

const OrchestrationInputSchema = z.object({
  scheduleId: z.string().nullable(),
  ownerId: z.string(),
  title: z.string().nullable(),
  prompt: z.string(),
  symbols: z.array(z.string()),
  emailTo: z.array(z.string()),
  attachPdf: z.boolean(),
  deepResearch: z.boolean(),
});

function toRun(row: RunRow): Run {
  return {
    id: row.id,
    scheduleId: row.schedule_id,
    ownerId: row.owner_id,
    status: row.status,
    stage: row.stage,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    durationMs: row.duration_ms,
    error: row.error,
    reportId: row.report_id,
    emailSent: row.email_sent === 1,
    emailError: row.email_error,
    createdAt: row.created_at,
  };
}

function parseColumn<T>(schema: z.ZodType<T>, value: string | null): T | null {
  return value === null ? null : schema.parse(JSON.parse(value));
}

/** Stage outputs written together with a stage transition. */
export interface StageOutputs {
  context?: ContextBundle;
  draft?: ReportDraft;
  reportId?: string;
}

export interface RunListFilters {
  ownerId?: string;
  scheduleId?: string;
  limit?: number;
}

export class RunStore {
  constructor(private db: Database.Database) {
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id TEXT PRIMARY KEY,
        schedule_id TEXT,
        owner_id TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        stage TEXT NOT NULL DEFAULT 'pending',
        input TEXT NOT NULL,
        context TEXT,
        draft TEXT,
        report_id TEXT,
        email_sent INTEGER NOT NULL DEFAULT 0,
        email_result TEXT,
        email_error TEXT,
        error TEXT,
        started_at TEXT,
        finished_at TEXT,
        duration_ms INTEGER,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_runs_owner ON runs (owner_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_runs_schedule ON runs (schedule_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_runs_status ON runs (status);
    `);
  }

  create(id: string, input: OrchestrationInput, now: Date = new Date()): Run {
    this.db
      .prepare(
        `INSERT INTO runs (id, schedule_id, owner_id, status, stage, input, created_at)
         VALUES (?, ?, ?, 'pending', 'pending', ?, ?)`,
      )
      .run(id, input.scheduleId, input.ownerId, JSON.stringify(input), now.toISOString());
    log.info({ runId: id, scheduleId: input.scheduleId }, "run created");

    const run = this.get(id);
    if (!run) {
      throw new Error(`Run '${id}' was not persisted`);
    }
    return run;
  }

  get(id: string, ownerId?: string): Run | undefined {
    const row = this.getRow(id);
    if (!row || (ownerId && row.owner_id !== ownerId)) return undefined;
    return toRun(row);
  }

  getCheckpoint(id: string): RunCheckpoint | undefined {
    const row = this.getRow(id);
    if (!row) return undefined;
    return {
      run: toRun(row),
      input: OrchestrationInputSchema.parse(JSON.parse(row.input)),
      context: parseColumn(ContextBundleSchema, row.context),
      draft: parseColumn(ReportDraftSchema, row.draft),
      delivery: parseColumn(DeliveryResultSchema, row.email_result),
    };
  }

  list(filters: RunListFilters = {}): Run[] {
    let sql = "SELECT * FROM runs WHERE 1=1";
    const params: unknown[] = [];

    if (filters.ownerId) {
      sql += " AND owner_id = ?";
      params.push(filters.ownerId);
    }
    if (filters.scheduleId) {
      sql += " AND schedule_id = ?";
      params.push(filters.scheduleId);
    }

    sql += " ORDER BY created_at DESC, id DESC LIMIT ?";
    params.push(filters.limit ?? 100);

    const rows = this.db.prepare(sql).all(...params) as RunRow[];
    return rows.map(toRun);
  }

  /** Runs a previous process left unfinished, oldest first. */
  listIncomplete(): Run[] {
    const rows = this.db
      .prepare("SELECT * FROM runs WHERE status IN ('pending', 'running') ORDER BY created_at ASC, id ASC")
      .all() as RunRow[];
    return rows.map(toRun);
  }

  /** pending → running, entering the first pipeline stage. */
  start(id: string, now: Date = new Date()): boolean {
    return this.transition(id, "running", {
      stage: "fetching_context",
      started_at: now.toISOString(),
    });
  }

  /** Persist a stage's output together with the stage that follows it. */
  advance(id: string, stage: RunStage, outputs: StageOutputs = {}): boolean {
    const fields = ["stage = ?"];
    const values: unknown[] = [stage];

    if (outputs.context !== undefined) {
      fields.push("context = ?");
      values.push(JSON.stringify(outputs.context));
    }
    if (outputs.draft !== undefined) {
      fields.push("draft = ?");
      values.push(JSON.stringify(outputs.draft));
    }
    if (outputs.reportId !== undefined) {
      fields.push("report_id = ?");
      values.push(outputs.reportId);
    }

    values.push(id);
    const result = this.db
      .prepare(`UPDATE runs SET ${fields.join(", ")} WHERE id = ? AND status = 'running'`)
      .run(...values);
    return result.changes > 0;
  }

  /** Move a run to a terminal status. Returns false when the run is already terminal. */
  finish(
    id: string,
    status: "succeeded" | "failed",
    details: { error?: string } = {},
    now: Date = new Date(),
  ): boolean {
    const row = this.getRow(id);
    if (!row) return false;

    const since = Date.parse(row.started_at ?? row.created_at);
    const finished = this.transition(id, status, {
      stage: status,
      error: details.error ?? null,
      finished_at: now.toISOString(),
      duration_ms: Math.max(0, now.getTime() - since),
    });
    if (finished) {
      log.info({ runId: id, status }, "run finished");
    }
    return finished;
  }

  /**
   * Take the one-time right to send this run's email. Returns false when a
   * previous attempt (possibly in an earlier process) already took it.
   */
  claimEmail(id: string): boolean {
    const result = this.db
      .prepare("UPDATE runs SET email_sent = 1 WHERE id = ? AND email_sent = 0")
      .run(id);
    return result.changes > 0;
  }

  recordDelivery(id: string, delivery: DeliveryResult): void {
    const annotation = delivery.sent ? null : (delivery.error ?? delivery.reason ?? "not sent");
    this.db
      .prepare("UPDATE runs SET email_result = ?, email_error = ? WHERE id = ?")
      .run(JSON.stringify(delivery), annotation, id);
  }

  private getRow(id: string): RunRow | undefined {
    return this.db.prepare("SELECT * FROM runs WHERE id = ?").get(id) as RunRow | undefined;
  }

  private transition(id: string, to: RunStatus, columns: Record<string, string | number | null>): boolean {
    const from = ALL_STATUSES.filter((status) => canTransition(status, to));
    if (from.length === 0) return false;

    const names = Object.keys(columns);
    const assignments = ["status = ?", ...names.map((name) => `${name} = ?`)];
    const result = this.db
      .prepare(
        `UPDATE runs SET ${assignments.join(", ")}
         WHERE id = ? AND status IN (${from.map(() => "?").join(", ")})`,
      )
      .run(to, ...names.map((name) => columns[name]), id, ...from);
    return result.changes > 0;
  }
}
