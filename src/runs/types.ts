import type { ContextBundle, ReportDraft, DeliveryResult } from "../activities/types.js";

export type RunStatus = "pending" | "running" | "succeeded" | "failed";

/** Orchestrator stage, persisted after each transition so a restart resumes where it stopped. */
export type RunStage =
  | "pending"
  | "fetching_context"
  | "synthesizing"
  | "saving_report"
  | "sending_email"
  | "succeeded"
  | "failed";

export const TERMINAL_STATUSES: readonly RunStatus[] = ["succeeded", "failed"];

const NEXT_STATUSES: Record<RunStatus, readonly RunStatus[]> = {
  pending: ["running"],
  running: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
};

/** Status only ever moves forward: pending → running → succeeded | failed. */
export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return NEXT_STATUSES[from].includes(to);
}

/** Everything an orchestration needs to execute, captured when the run is created. */
export interface OrchestrationInput {
  scheduleId: string | null;
  ownerId: string;
  title: string | null;
  prompt: string;
  symbols: string[];
  emailTo: string[];
  attachPdf: boolean;
  deepResearch: boolean;
}

/** Run entity -- one execution of the research pipeline. */
export interface Run {
  id: string;
  scheduleId: string | null;
  ownerId: string;
  status: RunStatus;
  stage: RunStage;
  startedAt: string | null;
  finishedAt: string | null;
  durationMs: number | null;
  /** Short failure summary: error class and stage. Never a stack trace. */
  error: string | null;
  reportId: string | null;
  emailSent: boolean;
  /** Delivery failure annotation; does not affect status. */
  emailError: string | null;
  createdAt: string;
}

/** Run plus the accumulated stage outputs the orchestrator resumes from. */
export interface RunCheckpoint {
  run: Run;
  input: OrchestrationInput;
  context: ContextBundle | null;
  draft: ReportDraft | null;
  delivery: DeliveryResult | null;
}

/** Raw `runs` row as stored in SQLite. */
export interface RunRow {
  id: string;
  schedule_id: string | null;
  owner_id: string;
  status: RunStatus;
  stage: RunStage;
  input: string; // JSON OrchestrationInput
  context: string | null; // JSON ContextBundle
  draft: string | null; // JSON ReportDraft
  report_id: string | null;
  email_sent: number; // 0 or 1
  email_result: string | null; // JSON DeliveryResult
  email_error: string | null;
  error: string | null;
  started_at: string | null;
  finished_at: string | null;
  duration_ms: number | null;
  created_at: string;
}
