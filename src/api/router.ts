/**
 * REST API router for schedules, runs, reports and tracked stocks.
 *
 * Decoupled from the HTTP server so it can be tested with a mock response.
 * Every route is scoped to the calling owner.
 *
 * Endpoints:
 *   GET    /api/schedules                 list schedules
 *   POST   /api/schedules                 create a schedule
 *   GET    /api/schedules/:id             get one schedule
 *   PUT    /api/schedules/:id             update a schedule
 *   DELETE /api/schedules/:id             delete a schedule
 *   POST   /api/schedules/:id/run         run a schedule now (202)
 *   POST   /api/run-once                  run an ad-hoc request (202)
 *   GET    /api/runs[?scheduleId=&limit=] list runs
 *   GET    /api/runs/:id                  get one run
 *   GET    /api/reports[?scheduleId=]     list reports
 *   GET    /api/reports/:id               get report metadata
 *   GET    /api/reports/:id/content       report document (?format=md|html)
 *   DELETE /api/reports/:id               delete report and documents
 *   POST   /api/reports/:id/send-email    email a report
 *   GET    /api/tracked-stocks            list tracked stocks
 *   POST   /api/tracked-stocks            track a recommendation (201)
 *   DELETE /api/tracked-stocks/:id        stop tracking
 *   GET    /api/tracked-stocks/prices     current prices (?symbols=A,B&exchanges=,NSE)
 *   GET    /api/tracked-stocks/performance  tracked stocks with change since recommendation
 */

import { randomUUID } from "node:crypto";
import type { ServerResponse } from "node:http";
import type { z } from "zod";
import type { ScheduleStore } from "../schedules/store.js";
import { type ScheduleService, ScheduleValidationError } from "../schedules/service.js";
import type { RunStore } from "../runs/store.js";
import type { ReportStore } from "../reports/store.js";
import type { ReportArchive } from "../reports/archive.js";
import { isReportFormat, type ReportFormat } from "../reports/types.js";
import { deleteReport } from "../reports/retention.js";
import type { RunDispatcher } from "../orchestrator/dispatcher.js";
import type { Activities } from "../activities/types.js";
import { InvalidRecurrenceRuleError } from "../recurrence/types.js";
import type { TrackedStockStore } from "../stocks/store.js";
import type { PriceProvider, Quote } from "../stocks/types.js";
import { MAX_PRICE_SYMBOLS } from "../stocks/prices.js";
import { withPerformance } from "../stocks/performance.js";
import {
  CreateScheduleBody,
  UpdateScheduleBody,
  RunOnceBody,
  SendEmailBody,
  CreateTrackedStockBody,
  formatIssues,
} from "./schemas.js";
import { sendJson, sendContent } from "./respond.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("api-router");

const CONTENT_TYPES: Record<ReportFormat, string> = {
  md: "text/markdown; charset=utf-8",
  html: "text/html; charset=utf-8",
  pdf: "application/pdf",
};

export interface RouterDeps {
  schedules: ScheduleStore;
  scheduleService: ScheduleService;
  runs: RunStore;
  reports: ReportStore;
  archive: ReportArchive;
  dispatcher: RunDispatcher;
  email: Pick<Activities, "sendEmail">;
  trackedStocks: TrackedStockStore;
  prices: PriceProvider;
  newId?: () => string;
  now?: () => Date;
}

type Parsed<T> = { ok: true; value: T } | { ok: false };

function clampLimit(raw: string | null, fallback: number, max: number): number {
  const limit = parseInt(raw ?? String(fallback), 10);
  return Number.isNaN(limit) ? fallback : Math.min(Math.max(limit, 1), max);
}

export class ApiRouter {
  constructor(private deps: RouterDeps) {}

  /**
   * Handle a request. Returns true if the route matched (response was sent),
   * false if no route matched (caller should send 404).
   */
  async handle(
    method: string,
    url: string,
    res: ServerResponse,
    ownerId: string,
    body?: unknown,
  ): Promise<boolean> {
    const [path, queryString] = url.split("?", 2);
    const query = new URLSearchParams(queryString ?? "");

    try {
      return await this.route(method, path, query, res, ownerId, body);
    } catch (e) {
      if (e instanceof InvalidRecurrenceRuleError || e instanceof ScheduleValidationError) {
        sendJson(res, 400, { error: e.message });
        return true;
      }
      throw e;
    }
  }

  private async route(
    method: string,
    path: string,
    query: URLSearchParams,
    res: ServerResponse,
    ownerId: string,
    body: unknown,
  ): Promise<boolean> {
    if (path === "/api/schedules") {
      if (method === "GET") {
        this.handleListSchedules(ownerId, res);
        return true;
      }
      if (method === "POST") {
        this.handleCreateSchedule(ownerId, body, res);
        return true;
      }
    }

    // POST /api/schedules/:id/run (before the single-schedule match)
    const runMatch = path.match(/^\/api\/schedules\/([^/]+)\/run$/);
    if (runMatch && method === "POST") {
      this.handleRunSchedule(decodeURIComponent(runMatch[1]), ownerId, res);
      return true;
    }

    const scheduleMatch = path.match(/^\/api\/schedules\/([^/]+)$/);
    if (scheduleMatch) {
      const id = decodeURIComponent(scheduleMatch[1]);
      switch (method) {
        case "GET":
          this.handleGetSchedule(id, ownerId, res);
          return true;
        case "PUT":
          this.handleUpdateSchedule(id, ownerId, body, res);
          return true;
        case "DELETE":
          this.handleDeleteSchedule(id, ownerId, res);
          return true;
      }
    }

    if (path === "/api/run-once" && method === "POST") {
      this.handleRunOnce(ownerId, body, res);
      return true;
    }

    if (path === "/api/runs" && method === "GET") {
      const runs = this.deps.runs.list({
        ownerId,
        scheduleId: query.get("scheduleId") ?? undefined,
        limit: clampLimit(query.get("limit"), 100, 500),
      });
      sendJson(res, 200, { runs });
      return true;
    }

    const singleRunMatch = path.match(/^\/api\/runs\/([^/]+)$/);
    if (singleRunMatch && method === "GET") {
      const id = decodeURIComponent(singleRunMatch[1]);
      const run = this.deps.runs.get(id, ownerId);
      if (!run) {
        sendJson(res, 404, { error: `Run '${id}' not found` });
        return true;
      }
      sendJson(res, 200, { run });
      return true;
    }

    if (path === "/api/reports" && method === "GET") {
      const reports = this.deps.reports.list({
        ownerId,
        scheduleId: query.get("scheduleId") ?? undefined,
        limit: clampLimit(query.get("limit"), 50, 500),
      });
      sendJson(res, 200, { reports });
      return true;
    }

    const contentMatch = path.match(/^\/api\/reports\/([^/]+)\/content$/);
    if (contentMatch && method === "GET") {
      await this.handleReportContent(decodeURIComponent(contentMatch[1]), ownerId, query.get("format") ?? "md", res);
      return true;
    }

    const emailMatch = path.match(/^\/api\/reports\/([^/]+)\/send-email$/);
    if (emailMatch && method === "POST") {
      await this.handleSendEmail(decodeURIComponent(emailMatch[1]), ownerId, body, res);
      return true;
    }

    const reportMatch = path.match(/^\/api\/reports\/([^/]+)$/);
    if (reportMatch) {
      const id = decodeURIComponent(reportMatch[1]);
      if (method === "GET") {
        const report = this.deps.reports.get(id, ownerId);
        if (!report) {
          sendJson(res, 404, { error: `Report '${id}' not found` });
          return true;
        }
        sendJson(res, 200, { report });
        return true;
      }
      if (method === "DELETE") {
        await this.handleDeleteReport(id, ownerId, res);
        return true;
      }
    }

    if (path === "/api/tracked-stocks") {
      if (method === "GET") {
        sendJson(res, 200, { stocks: this.deps.trackedStocks.list(ownerId) });
        return true;
      }
      if (method === "POST") {
        this.handleCreateTrackedStock(ownerId, body, res);
        return true;
      }
    }

    if (path === "/api/tracked-stocks/prices" && method === "GET") {
      await this.handlePrices(query, res);
      return true;
    }

    if (path === "/api/tracked-stocks/performance" && method === "GET") {
      const stocks = this.deps.trackedStocks.list(ownerId);
      const prices = await this.deps.prices.fetchPrices(
        stocks.map((stock) => ({ symbol: stock.symbol, exchange: stock.exchange })),
      );
      sendJson(res, 200, { stocks: stocks.map((stock) => withPerformance(stock, prices)) });
      return true;
    }

    const stockMatch = path.match(/^\/api\/tracked-stocks\/([^/]+)$/);
    if (stockMatch && method === "DELETE") {
      const id = decodeURIComponent(stockMatch[1]);
      if (!this.deps.trackedStocks.delete(id, ownerId)) {
        sendJson(res, 404, { error: "Tracked stock not found" });
        return true;
      }
      sendJson(res, 200, { deleted: true, stockId: id });
      return true;
    }

    return false;
  }

  private handleCreateTrackedStock(ownerId: string, body: unknown, res: ServerResponse): void {
    const parsed = parseBody(CreateTrackedStockBody, body ?? {}, res);
    if (!parsed.ok) return;

    const stock = this.deps.trackedStocks.create(
      { id: (this.deps.newId ?? randomUUID)(), ownerId, ...parsed.value },
      this.deps.now?.() ?? new Date(),
    );
    sendJson(res, 201, { stock });
  }

  private async handlePrices(query: URLSearchParams, res: ServerResponse): Promise<void> {
    const symbols = (query.get("symbols") ?? "").split(",");
    const exchanges = (query.get("exchanges") ?? "").split(",");
    const quotes: Quote[] = [];
    symbols.forEach((raw, i) => {
      const symbol = raw.trim().toUpperCase();
      const exchange = exchanges[i]?.trim().toUpperCase();
      if (symbol) quotes.push({ symbol, exchange: exchange || null });
    });

    if (quotes.length === 0) {
      sendJson(res, 400, { error: "symbols query parameter required (comma-separated)" });
      return;
    }

    const prices = await this.deps.prices.fetchPrices(quotes.slice(0, MAX_PRICE_SYMBOLS));
    sendJson(res, 200, { prices });
  }

  // ── Schedules ──────────────────────────────────────────────────────

  private handleListSchedules(ownerId: string, res: ServerResponse): void {
    sendJson(res, 200, { schedules: this.deps.schedules.list({ ownerId }) });
  }

  private handleGetSchedule(id: string, ownerId: string, res: ServerResponse): void {
    const schedule = this.deps.schedules.get(id, ownerId);
    if (!schedule) {
      sendJson(res, 404, { error: `Schedule '${id}' not found` });
      return;
    }
    sendJson(res, 200, { schedule });
  }

  private handleCreateSchedule(ownerId: string, body: unknown, res: ServerResponse): void {
    const parsed = parseBody(CreateScheduleBody, body ?? {}, res);
    if (!parsed.ok) return;

    const schedule = this.deps.scheduleService.create(ownerId, parsed.value);
    log.info({ scheduleId: schedule.id, ownerId }, "schedule created via API");
    sendJson(res, 201, { schedule });
  }

  private handleUpdateSchedule(id: string, ownerId: string, body: unknown, res: ServerResponse): void {
    const parsed = parseBody(UpdateScheduleBody, body ?? {}, res);
    if (!parsed.ok) return;

    const schedule = this.deps.scheduleService.update(id, ownerId, parsed.value);
    if (!schedule) {
      sendJson(res, 404, { error: `Schedule '${id}' not found` });
      return;
    }
    sendJson(res, 200, { schedule });
  }

  private handleDeleteSchedule(id: string, ownerId: string, res: ServerResponse): void {
    if (!this.deps.schedules.delete(id, ownerId)) {
      sendJson(res, 404, { error: `Schedule '${id}' not found` });
      return;
    }
    sendJson(res, 200, { deleted: true, id });
  }

  private handleRunSchedule(id: string, ownerId: string, res: ServerResponse): void {
    const schedule = this.deps.schedules.get(id, ownerId);
    if (!schedule) {
      sendJson(res, 404, { error: `Schedule '${id}' not found` });
      return;
    }
    const run = this.deps.dispatcher.runNow(schedule);
    sendJson(res, 202, { runId: run.id, status: run.status });
  }

  private handleRunOnce(ownerId: string, body: unknown, res: ServerResponse): void {
    const parsed = parseBody(RunOnceBody, body ?? {}, res);
    if (!parsed.ok) return;

    const run = this.deps.dispatcher.runOnce({ ownerId, ...parsed.value });
    sendJson(res, 202, { runId: run.id, status: run.status });
  }

  // ── Reports ────────────────────────────────────────────────────────

  /** Serve a report document to a caller holding a verified signed link. */
  async serveReportContent(id: string, format: ReportFormat, res: ServerResponse): Promise<void> {
    await this.handleReportContent(id, null, format, res);
  }

  private async handleReportContent(
    id: string,
    ownerId: string | null,
    format: string,
    res: ServerResponse,
  ): Promise<void> {
    if (!isReportFormat(format)) {
      sendJson(res, 400, { error: `Unsupported format '${format}'` });
      return;
    }
    const report = this.deps.reports.get(id, ownerId ?? undefined);
    const path = report?.blobPaths[format];
    if (!report || !path) {
      sendJson(res, 404, { error: `Report '${id}' has no ${format} document` });
      return;
    }
    const content = await this.deps.archive.read(path);
    if (!content) {
      sendJson(res, 404, { error: `Report '${id}' has no ${format} document` });
      return;
    }
    sendContent(res, CONTENT_TYPES[format], content);
  }

  private async handleDeleteReport(id: string, ownerId: string, res: ServerResponse): Promise<void> {
    const report = this.deps.reports.get(id, ownerId);
    if (!report) {
      sendJson(res, 404, { error: `Report '${id}' not found` });
      return;
    }
    await deleteReport(report, { reports: this.deps.reports, archive: this.deps.archive });
    sendJson(res, 200, { deleted: true, id });
  }

  private async handleSendEmail(id: string, ownerId: string, body: unknown, res: ServerResponse): Promise<void> {
    const parsed = parseBody(SendEmailBody, body ?? {}, res);
    if (!parsed.ok) return;

    const report = this.deps.reports.get(id, ownerId);
    if (!report) {
      sendJson(res, 404, { error: `Report '${id}' not found` });
      return;
    }
    const result = await this.deps.email.sendEmail(report, parsed.value.emailTo, parsed.value.attachPdf ?? false);
    sendJson(res, 200, { reportId: id, ...result });
  }
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, res: ServerResponse): Parsed<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    sendJson(res, 400, { error: formatIssues(result.error) });
    return { ok: false };
  }
  return { ok: true, value: result.data };
}
