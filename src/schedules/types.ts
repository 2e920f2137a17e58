import type { RecurrenceRule } from "../recurrence/types.js";

export interface EmailSettings {
  to: string[];
  /** Attach the rendered report document to the email. */
  attachPdf: boolean;
}

/** Schedule entity -- a recurring research request. */
export interface Schedule {
  id: string;
  ownerId: string;
  title: string | null;
  prompt: string;
  symbols: string[];
  recurrence: RecurrenceRule;
  email: EmailSettings;
  deepResearch: boolean;
  active: boolean;
  /** ISO-8601 UTC; null exactly when the schedule is inactive. */
  nextRunAt: string | null;
  /** Optimistic concurrency token, bumped on every write. */
  version: number;
  createdAt: string;
  updatedAt: string;
}

/** Raw `schedules` row as stored in SQLite. */
export interface ScheduleRow {
  id: string;
  owner_id: string;
  title: string | null;
  prompt: string;
  symbols: string; // JSON array
  recurrence: string; // JSON RecurrenceRule
  email: string; // JSON EmailSettings
  deep_research: number; // 0 or 1
  active: number; // 0 or 1
  next_run_at: string | null;
  version: number;
  created_at: string;
  updated_at: string;
}

export interface CreateScheduleInput {
  id: string;
  ownerId: string;
  title?: string | null;
  prompt?: string;
  symbols?: string[];
  recurrence: RecurrenceRule;
  email?: Partial<EmailSettings>;
  deepResearch?: boolean;
  active?: boolean;
  nextRunAt: string | null;
}

export interface UpdateScheduleInput {
  title?: string | null;
  prompt?: string;
  symbols?: string[];
  recurrence?: RecurrenceRule;
  email?: EmailSettings;
  deepResearch?: boolean;
  active?: boolean;
  nextRunAt?: string | null;
}
