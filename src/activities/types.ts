import { z } from "zod";
import type { Report } from "../reports/types.js";
import type { OrchestrationInput } from "../runs/types.js";

export const SourceDocumentSchema = z.object({
  title: z.string(),
  url: z.string(),
  text: z.string(),
});

export const ContextBundleSchema = z.object({
  documents: z.array(SourceDocumentSchema),
  fetchedAt: z.string(),
});

export const CitationSchema = z.object({
  title: z.string(),
  url: z.string(),
});

export const ReportDraftSchema = z.object({
  title: z.string(),
  summaryMarkdown: z.string(),
  citations: z.array(CitationSchema),
});

export const DeliveryResultSchema = z.object({
  sent: z.boolean(),
  error: z.string().optional(),
  reason: z.string().optional(),
});

export type SourceDocument = z.infer<typeof SourceDocumentSchema>;
export type ContextBundle = z.infer<typeof ContextBundleSchema>;
export type Citation = z.infer<typeof CitationSchema>;
export type ReportDraft = z.infer<typeof ReportDraftSchema>;
export type DeliveryResult = z.infer<typeof DeliveryResultSchema>;

/** What the synthesis stage needs beyond the context bundle. */
export interface SynthesisRequest {
  prompt: string;
  symbols: string[];
  deepResearch: boolean;
}

/** Identity of the run a report is being saved for. */
export interface SaveReportTarget {
  runId: string;
  input: OrchestrationInput;
}

/**
 * The four externally-facing pipeline stages.
 *
 * fetch/synthesize/save throw TransientError or PermanentError; the
 * orchestrator retries only the former. sendEmail never throws.
 */
export interface Activities {
  fetchContext(query: string, symbols: string[], signal: AbortSignal): Promise<ContextBundle>;
  synthesizeReport(
    context: ContextBundle,
    request: SynthesisRequest,
    signal: AbortSignal,
  ): Promise<ReportDraft>;
  /** Safe to repeat for the same runId: the report id is derived from it and blobs are overwritten. */
  saveReport(draft: ReportDraft, target: SaveReportTarget, signal: AbortSignal): Promise<Report>;
  sendEmail(report: Report, recipients: string[], attachPdf: boolean): Promise<DeliveryResult>;
}
