import type Database from "better-sqlite3";
import type { TrackedStock, TrackedStockRow, CreateTrackedStockInput } from "./types.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("tracked-stock-store");

function toTrackedStock(row: TrackedStockRow): TrackedStock {
  return {
    id: row.id,
    ownerId: row.owner_id,
    symbol: row.symbol,
    exchange: row.exchange,
    reportId: row.report_id,
    reportTitle: row.report_title,
    recommendationDate: row.recommendation_date,
    recommendationPrice: row.recommendation_price,
    createdAt: row.created_at,
  };
}

export class TrackedStockStore {
  constructor(private db: Database.Database) {
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tracked_stocks (
        id TEXT PRIMARY KEY,
        owner_id TEXT NOT NULL,
        symbol TEXT NOT NULL,
        exchange TEXT,
        report_id TEXT,
        report_title TEXT,
        recommendation_date TEXT NOT NULL,
        recommendation_price REAL NOT NULL,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_tracked_stocks_owner ON tracked_stocks (owner_id, symbol);
    `);
  }

  create(input: CreateTrackedStockInput, now: Date = new Date()): TrackedStock {
    this.db
      .prepare(
        `INSERT INTO tracked_stocks (id, owner_id, symbol, exchange, report_id, report_title,
                                     recommendation_date, recommendation_price, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.id,
        input.ownerId,
        input.symbol,
        input.exchange ?? null,
        input.reportId ?? null,
        input.reportTitle ?? null,
        input.recommendationDate,
        input.recommendationPrice,
        now.toISOString(),
      );
    log.info({ id: input.id, ownerId: input.ownerId, symbol: input.symbol }, "tracked stock created");

    const created = this.get(input.id);
    if (!created) {
      throw new Error(`Tracked stock '${input.id}' was not persisted`);
    }
    return created;
  }

  get(id: string, ownerId?: string): TrackedStock | undefined {
    const row = (
      ownerId
        ? this.db.prepare("SELECT * FROM tracked_stocks WHERE id = ? AND owner_id = ?").get(id, ownerId)
        : this.db.prepare("SELECT * FROM tracked_stocks WHERE id = ?").get(id)
    ) as TrackedStockRow | undefined;
    return row ? toTrackedStock(row) : undefined;
  }

  /** An owner's tracked stocks, by symbol then recommendation date. */
  list(ownerId: string): TrackedStock[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM tracked_stocks WHERE owner_id = ?
         ORDER BY symbol ASC, recommendation_date ASC, id ASC`,
      )
      .all(ownerId) as TrackedStockRow[];
    return rows.map(toTrackedStock);
  }

  delete(id: string, ownerId: string): boolean {
    const result = this.db.prepare("DELETE FROM tracked_stocks WHERE id = ? AND owner_id = ?").run(id, ownerId);
    if (result.changes > 0) {
      log.info({ id }, "tracked stock deleted");
      return true;
    }
    return false;
  }
}
