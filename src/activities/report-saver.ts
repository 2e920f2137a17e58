import { marked } from "marked";
import DOMPurify from "isomorphic-dompurify";
import type { ReportArchive } from "../reports/archive.js";
import type { ReportStore } from "../reports/store.js";
import { reportIdForRun, type Report } from "../reports/types.js";
import type { ReportDraft, SaveReportTarget } from "./types.js";
import { escapeHtml } from "../util/html.js";

const SUMMARY_LENGTH = 280;

export function composeMarkdown(draft: ReportDraft): string {
  const body = draft.summaryMarkdown.trimEnd();
  if (draft.citations.length === 0) return `${body}\n`;
  const sources = draft.citations.map((c, i) => `${i + 1}. [${c.title}](${c.url})`);
  return `${body}\n\n## Sources\n\n${sources.join("\n")}\n`;
}

/** First prose paragraph of the report, for listings. */
export function summarize(markdown: string): string | null {
  const paragraph = markdown
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .find((p) => p.length > 0 && !p.startsWith("#"));
  if (!paragraph) return null;
  const flat = paragraph.replace(/\s+/g, " ");
  return flat.length > SUMMARY_LENGTH ? `${flat.slice(0, SUMMARY_LENGTH - 3)}...` : flat;
}

export async function renderReportHtml(title: string, markdown: string): Promise<string> {
  // Model output carries text lifted from web pages; raw HTML in it is untrusted.
  const body = DOMPurify.sanitize(await marked.parse(markdown));
  return [
    "<!doctype html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    "</head>",
    "<body>",
    body,
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

/**
 * Persists a draft: documents into the archive, metadata into the store.
 * Keyed by run, so replaying a save overwrites the first one.
 */
export class ReportSaver {
  constructor(
    private archive: ReportArchive,
    private store: ReportStore,
    private now: () => Date = () => new Date(),
  ) {}

  async saveReport(draft: ReportDraft, target: SaveReportTarget, signal: AbortSignal): Promise<Report> {
    const { runId, input } = target;
    const prefix = this.archive.runPrefix(input.ownerId, input.scheduleId, runId);
    const markdown = composeMarkdown(draft);
    const blobPaths = { md: `${prefix}/report.md`, html: `${prefix}/report.html` };

    await this.archive.write(blobPaths.md, markdown, signal);
    await this.archive.write(blobPaths.html, await renderReportHtml(draft.title, markdown), signal);

    return this.store.upsert({
      id: reportIdForRun(runId),
      runId,
      scheduleId: input.scheduleId,
      ownerId: input.ownerId,
      title: draft.title,
      prompt: input.prompt || null,
      symbols: input.symbols,
      summary: summarize(draft.summaryMarkdown),
      blobPaths,
      citations: draft.citations,
      createdAt: this.now().toISOString(),
    });
  }
}
