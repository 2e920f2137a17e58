/**
 * ReportStore -- SQLite-backed report metadata. Rendered documents live in
 * the ReportArchive; rows only carry their relative paths.
 */

import type Database from "better-sqlite3";
import { z } from "zod";
import type { Report, ReportRow, BlobPaths } from "./types.js";
import { CitationSchema } from "../activities/types.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("report-store");

const SymbolsColumn = z.array(z.string());
const CitationsColumn = z.array(CitationSchema);
const BlobPathsColumn: z.ZodType<BlobPaths> = z.object({
  md: z.string(),
  html: z.string().optional(),
  pdf: z.string().optional(),
});

function toReport(row: ReportRow): Report {
  return {
    id: row.id,
    runId: row.run_id,
    scheduleId: row.schedule_id,
    ownerId: row.owner_id,
    title: row.title,
    prompt: row.prompt,
    symbols: SymbolsColumn.parse(JSON.parse(row.symbols)),
    summary: row.summary,
    blobPaths: BlobPathsColumn.parse(JSON.parse(row.blob_paths)),
    citations: CitationsColumn.parse(JSON.parse(row.citations)),
    createdAt: row.created_at,
  };
}

export class ReportStore {
  constructor(private db: Database.Database) {
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS reports (
        id TEXT PRIMARY KEY,
        run_id TEXT NOT NULL UNIQUE,
        schedule_id TEXT,
        owner_id TEXT NOT NULL,
        title TEXT NOT NULL,
        prompt TEXT,
        symbols TEXT NOT NULL DEFAULT '[]',
        summary TEXT,
        blob_paths TEXT NOT NULL,
        citations TEXT NOT NULL DEFAULT '[]',
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_reports_owner ON reports (owner_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_reports_schedule ON reports (schedule_id, created_at);
    `);
  }

  /**
   * Insert or overwrite a report. The id is derived from the run, so a replayed
   * save replaces the first write. `created_at` keeps its original value.
   */
  upsert(report: Report): Report {
    if (!report.blobPaths.md) {
      throw new Error(`Report '${report.id}' has no markdown document`);
    }

    this.db
      .prepare(
        `INSERT INTO reports (id, run_id, schedule_id, owner_id, title, prompt, symbols,
                              summary, blob_paths, citations, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           title = excluded.title,
           prompt = excluded.prompt,
           symbols = excluded.symbols,
           summary = excluded.summary,
           blob_paths = excluded.blob_paths,
           citations = excluded.citations`,
      )
      .run(
        report.id,
        report.runId,
        report.scheduleId,
        report.ownerId,
        report.title,
        report.prompt,
        JSON.stringify(report.symbols),
        report.summary,
        JSON.stringify(report.blobPaths),
        JSON.stringify(report.citations),
        report.createdAt,
      );
    log.info({ id: report.id, runId: report.runId }, "report saved");

    const saved = this.get(report.id);
    if (!saved) {
      throw new Error(`Report '${report.id}' was not persisted`);
    }
    return saved;
  }

  get(id: string, ownerId?: string): Report | undefined {
    const row = (
      ownerId
        ? this.db.prepare("SELECT * FROM reports WHERE id = ? AND owner_id = ?").get(id, ownerId)
        : this.db.prepare("SELECT * FROM reports WHERE id = ?").get(id)
    ) as ReportRow | undefined;
    return row ? toReport(row) : undefined;
  }

  list(filters: { ownerId?: string; scheduleId?: string; limit?: number } = {}): Report[] {
    let sql = "SELECT * FROM reports WHERE 1=1";
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
    params.push(filters.limit ?? 50);

    const rows = this.db.prepare(sql).all(...params) as ReportRow[];
    return rows.map(toReport);
  }

  /** Reports created strictly before `cutoff`. */
  listCreatedBefore(cutoff: Date): Report[] {
    const rows = this.db
      .prepare("SELECT * FROM reports WHERE created_at < ? ORDER BY created_at ASC")
      .all(cutoff.toISOString()) as ReportRow[];
    return rows.map(toReport);
  }

  delete(id: string): boolean {
    const result = this.db.prepare("DELETE FROM reports WHERE id = ?").run(id);
    if (result.changes > 0) {
      log.info({ id }, "report deleted");
      return true;
    }
    return false;
  }

  count(): number {
    const row = this.db.prepare("SELECT COUNT(*) as count FROM reports").get() as {
      count: number;
    };
    return row.count;
  }
}
