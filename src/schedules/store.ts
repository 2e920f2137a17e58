/**
 * ScheduleStore -- SQLite-backed CRUD for schedule entities.
 *
 * `nextRunAt` is written by create/update (from the request time) and by
 * `claimNextRun`, which the due-schedule scanner uses to take ownership of
 * one occurrence. Every write bumps `version`; the claim only succeeds when
 * the caller's version is still current.
 */

import type Database from "better-sqlite3";
import { z } from "zod";
import type {
  Schedule,
  ScheduleRow,
  CreateScheduleInput,
  UpdateScheduleInput,
  EmailSettings,
} from "./types.js";
import { parseRecurrenceRule } from "../recurrence/calculator.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("schedule-store");

const SymbolsColumn = z.array(z.string());
const EmailColumn = z.object({
  to: z.array(z.string()),
  attachPdf: z.boolean(),
});

function toSchedule(row: ScheduleRow): Schedule {
  return {
    id: row.id,
    ownerId: row.owner_id,
    title: row.title,
    prompt: row.prompt,
    symbols: SymbolsColumn.parse(JSON.parse(row.symbols)),
    recurrence: parseRecurrenceRule(JSON.parse(row.recurrence)),
    email: EmailColumn.parse(JSON.parse(row.email)),
    deepResearch: row.deep_research === 1,
    active: row.active === 1,
    nextRunAt: row.next_run_at,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class ScheduleStore {
  constructor(private db: Database.Database) {
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schedules (
        id TEXT PRIMARY KEY,
        owner_id TEXT NOT NULL,
        title TEXT,
        prompt TEXT NOT NULL DEFAULT '',
        symbols TEXT NOT NULL DEFAULT '[]',
        recurrence TEXT NOT NULL,
        email TEXT NOT NULL,
        deep_research INTEGER DEFAULT 0,
        active INTEGER DEFAULT 1,
        next_run_at TEXT,
        version INTEGER NOT NULL DEFAULT 1,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_schedules_due ON schedules (active, next_run_at);
      CREATE INDEX IF NOT EXISTS idx_schedules_owner ON schedules (owner_id, created_at);
    `);
  }

  list(filters?: { ownerId?: string; active?: boolean }): Schedule[] {
    let sql = "SELECT * FROM schedules WHERE 1=1";
    const params: unknown[] = [];

    if (filters?.ownerId) {
      sql += " AND owner_id = ?";
      params.push(filters.ownerId);
    }
    if (filters?.active !== undefined) {
      sql += " AND active = ?";
      params.push(filters.active ? 1 : 0);
    }

    sql += " ORDER BY created_at DESC, id ASC";
    const rows = this.db.prepare(sql).all(...params) as ScheduleRow[];
    return rows.map(toSchedule);
  }

  /** Look up a schedule. With `ownerId`, schedules of other owners are invisible. */
  get(id: string, ownerId?: string): Schedule | undefined {
    const row = (
      ownerId
        ? this.db.prepare("SELECT * FROM schedules WHERE id = ? AND owner_id = ?").get(id, ownerId)
        : this.db.prepare("SELECT * FROM schedules WHERE id = ?").get(id)
    ) as ScheduleRow | undefined;
    return row ? toSchedule(row) : undefined;
  }

  create(input: CreateScheduleInput, now: Date = new Date()): Schedule {
    const email: EmailSettings = {
      to: input.email?.to ?? [],
      attachPdf: input.email?.attachPdf ?? false,
    };
    const timestamp = now.toISOString();
    const active = input.active !== false;

    this.db
      .prepare(
        `INSERT INTO schedules (id, owner_id, title, prompt, symbols, recurrence, email,
                                deep_research, active, next_run_at, version, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1, ?, ?)`,
      )
      .run(
        input.id,
        input.ownerId,
        input.title ?? null,
        input.prompt ?? "",
        JSON.stringify(input.symbols ?? []),
        JSON.stringify(input.recurrence),
        JSON.stringify(email),
        input.deepResearch ? 1 : 0,
        active ? 1 : 0,
        active ? input.nextRunAt : null,
        timestamp,
        timestamp,
      );
    log.info({ id: input.id, ownerId: input.ownerId, nextRunAt: input.nextRunAt }, "schedule created");

    const created = this.get(input.id);
    if (!created) {
      throw new Error(`Schedule '${input.id}' was not persisted`);
    }
    return created;
  }

  update(
    id: string,
    input: UpdateScheduleInput,
    options: { ownerId?: string; now?: Date } = {},
  ): Schedule | undefined {
    const existing = this.get(id, options.ownerId);
    if (!existing) return undefined;

    const fields: string[] = [];
    const values: unknown[] = [];

    if (input.title !== undefined) {
      fields.push("title = ?");
      values.push(input.title);
    }
    if (input.prompt !== undefined) {
      fields.push("prompt = ?");
      values.push(input.prompt);
    }
    if (input.symbols !== undefined) {
      fields.push("symbols = ?");
      values.push(JSON.stringify(input.symbols));
    }
    if (input.recurrence !== undefined) {
      fields.push("recurrence = ?");
      values.push(JSON.stringify(input.recurrence));
    }
    if (input.email !== undefined) {
      fields.push("email = ?");
      values.push(JSON.stringify(input.email));
    }
    if (input.deepResearch !== undefined) {
      fields.push("deep_research = ?");
      values.push(input.deepResearch ? 1 : 0);
    }
    if (input.active !== undefined) {
      fields.push("active = ?");
      values.push(input.active ? 1 : 0);
    }
    if (input.nextRunAt !== undefined) {
      fields.push("next_run_at = ?");
      values.push(input.nextRunAt);
    }

    if (fields.length === 0) return existing;

    fields.push("version = version + 1", "updated_at = ?");
    values.push((options.now ?? new Date()).toISOString(), id);

    this.db.prepare(`UPDATE schedules SET ${fields.join(", ")} WHERE id = ?`).run(...values);
    log.info({ id }, "schedule updated");
    return this.get(id);
  }

  /**
   * Advance `nextRunAt` for one due occurrence. Returns false when another
   * writer got there first (version moved on) or the schedule was deactivated.
   */
  claimNextRun(id: string, expectedVersion: number, nextRunAt: string, now: Date = new Date()): boolean {
    const result = this.db
      .prepare(
        `UPDATE schedules
         SET next_run_at = ?, version = version + 1, updated_at = ?
         WHERE id = ? AND version = ? AND active = 1`,
      )
      .run(nextRunAt, now.toISOString(), id, expectedVersion);
    return result.changes > 0;
  }

  /** Active schedules whose nextRunAt is at or before `now`, oldest first. */
  listDue(now: Date, limit: number): Schedule[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM schedules
         WHERE active = 1 AND next_run_at IS NOT NULL AND next_run_at <= ?
         ORDER BY next_run_at ASC, id ASC
         LIMIT ?`,
      )
      .all(now.toISOString(), limit) as ScheduleRow[];
    return rows.map(toSchedule);
  }

  delete(id: string, ownerId?: string): boolean {
    const result = ownerId
      ? this.db.prepare("DELETE FROM schedules WHERE id = ? AND owner_id = ?").run(id, ownerId)
      : this.db.prepare("DELETE FROM schedules WHERE id = ?").run(id);
    if (result.changes > 0) {
      log.info({ id }, "schedule deleted");
      return true;
    }
    return false;
  }

  count(): number {
    const row = this.db.prepare("SELECT COUNT(*) as count FROM schedules").get() as {
      count: number;
    };
    return row.count;
  }
}
