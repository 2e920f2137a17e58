import type { Citation } from "../activities/types.js";

export interface BlobPaths {
  /** Always present. */
  md: string;
  html?: string;
  pdf?: string;
}

export type ReportFormat = keyof BlobPaths;

export function isReportFormat(value: string): value is ReportFormat {
  return value === "md" || value === "html" || value === "pdf";
}

/** Report entity -- the artifact of a successful run. One per run. */
export interface Report {
  id: string;
  runId: string;
  scheduleId: string | null;
  ownerId: string;
  title: string;
  prompt: string | null;
  symbols: string[];
  summary: string | null;
  blobPaths: BlobPaths;
  citations: Citation[];
  createdAt: string;
}

/** Raw `reports` row as stored in SQLite. */
export interface ReportRow {
  id: string;
  run_id: string;
  schedule_id: string | null;
  owner_id: string;
  title: string;
  prompt: string | null;
  symbols: string; // JSON array
  summary: string | null;
  blob_paths: string; // JSON BlobPaths
  citations: string; // JSON Citation[]
  created_at: string;
}

/** Deterministic report id: saving the same run twice overwrites instead of duplicating. */
export function reportIdForRun(runId: string): string {
  return `report-${runId}`;
}
