import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import Database from "better-sqlite3";
import { ReportSaver, composeMarkdown, summarize, renderReportHtml } from "./report-saver.js";
import { ReportArchive } from "../reports/archive.js";
import { ReportStore } from "../reports/store.js";
import type { OrchestrationInput } from "../runs/types.js";
import type { ReportDraft } from "./types.js";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

const input: OrchestrationInput = {
  scheduleId: "sched-1",
  ownerId: "dev-user",
  title: null,
  prompt: "Chip outlook",
  symbols: ["NVDA"],
  emailTo: [],
  attachPdf: false,
  deepResearch: false,
};

const draft: ReportDraft = {
  title: "Chip Outlook",
  summaryMarkdown: "# Chip Outlook\n\nDemand remains strong.",
  citations: [{ title: "Source A", url: "https://news.test/a" }],
};

describe("composeMarkdown", () => {
  it("appends a numbered sources section", () => {
    expect(composeMarkdown(draft)).toBe(
      "# Chip Outlook\n\nDemand remains strong.\n\n## Sources\n\n1. [Source A](https://news.test/a)\n",
    );
  });

  it("leaves the body alone without citations", () => {
    expect(composeMarkdown({ ...draft, citations: [] })).toBe("# Chip Outlook\n\nDemand remains strong.\n");
  });
});

describe("summarize", () => {
  it("returns the first non-heading paragraph, flattened", () => {
    expect(summarize("# Title\n\nFirst line\nsecond line.\n\nMore.")).toBe("First line second line.");
  });

  it("truncates long paragraphs", () => {
    const summary = summarize("x".repeat(400));
    expect(summary).toHaveLength(280);
    expect(summary?.endsWith("...")).toBe(true);
  });

  it("returns null when there is no prose", () => {
    expect(summarize("# Only a heading")).toBeNull();
  });
});

describe("renderReportHtml", () => {
  it("wraps rendered markdown in a document with an escaped title", async () => {
    const html = await renderReportHtml("A <b> title", "Hello **world**");
    expect(html).toContain("<title>A &lt;b&gt; title</title>");
    expect(html).toContain("<p>Hello <strong>world</strong></p>");
  });

  it("strips scripts and event handlers from model output", async () => {
    const html = await renderReportHtml(
      "T",
      "Intro\n\n<script>alert(1)</script>\n\n<img src=\"x.png\" onerror=\"alert(2)\">",
    );
    expect(html).toContain("<p>Intro</p>");
    expect(html).toContain('<img src="x.png">');
    expect(html).not.toContain("<script");
    expect(html).not.toContain("onerror");
  });
});

describe("ReportSaver", () => {
  let tmpDir: string;
  let db: Database.Database;
  let store: ReportStore;
  let saver: ReportSaver;
  const signal = new AbortController().signal;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "research-saver-test-"));
    db = new Database(":memory:");
    store = new ReportStore(db);
    saver = new ReportSaver(new ReportArchive(tmpDir), store, () => new Date("2026-03-02T09:05:00.000Z"));
  });

  afterEach(() => {
    db.close();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes both documents and stores the report under a run-derived id", async () => {
    const report = await saver.saveReport(draft, { runId: "run-1", input }, signal);

    expect(report).toEqual({
      id: "report-run-1",
      runId: "run-1",
      scheduleId: "sched-1",
      ownerId: "dev-user",
      title: "Chip Outlook",
      prompt: "Chip outlook",
      symbols: ["NVDA"],
      summary: "Demand remains strong.",
      blobPaths: {
        md: "dev-user/sched-1/run-1/report.md",
        html: "dev-user/sched-1/run-1/report.html",
      },
      citations: [{ title: "Source A", url: "https://news.test/a" }],
      createdAt: "2026-03-02T09:05:00.000Z",
    });
    expect(readFileSync(join(tmpDir, "dev-user/sched-1/run-1/report.md"), "utf-8")).toBe(
      composeMarkdown(draft),
    );
  });

  it("saving the same run twice leaves one report", async () => {
    await saver.saveReport(draft, { runId: "run-1", input }, signal);
    const second = await saver.saveReport({ ...draft, title: "Revised" }, { runId: "run-1", input }, signal);

    expect(store.count()).toBe(1);
    expect(second.title).toBe("Revised");
  });

  it("files ad-hoc runs under one-off", async () => {
    const report = await saver.saveReport(draft, { runId: "run-2", input: { ...input, scheduleId: null } }, signal);

    expect(report.blobPaths.md).toBe("dev-user/one-off/run-2/report.md");
  });
});
