import { z } from "zod";
import type { LlmConfig } from "../config.js";
import {
  CitationSchema,
  type Citation,
  type ContextBundle,
  type ReportDraft,
  type SynthesisRequest,
} from "./types.js";
import { PermanentError, TransientError, httpError } from "./errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("synthesize");

const SYSTEM_PROMPT = [
  "You are a financial research assistant.",
  "Write a well-structured markdown research report grounded in the numbered sources provided.",
  "Cite sources inline as [n].",
  'Reply with a JSON object: {"title": string, "markdown": string, "citations": [{"title": string, "url": string}]}.',
].join(" ");

const MAX_SOURCE_CHARS = 700;

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        finish_reason: z.string().nullable().optional(),
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

const ModelReportSchema = z.object({
  title: z.string().trim().min(1).optional(),
  markdown: z.string().trim().min(1),
  citations: z.array(CitationSchema).optional(),
});

const ProviderErrorSchema = z.object({
  error: z.object({ code: z.string().nullable().optional() }),
});

export function buildUserPrompt(context: ContextBundle, request: SynthesisRequest): string {
  const lines: string[] = [];
  if (request.prompt.trim()) {
    lines.push(`Research request: ${request.prompt.trim()}`);
  }
  if (request.symbols.length > 0) {
    lines.push(`Symbols: ${request.symbols.join(", ")}`);
  }

  lines.push("", "Sources:");
  if (context.documents.length === 0) {
    lines.push("(none found; rely on general knowledge and say so)");
  }
  context.documents.forEach((doc, i) => {
    lines.push(`[${i + 1}] ${doc.title} - ${doc.url}`);
    if (doc.text) lines.push(doc.text.slice(0, MAX_SOURCE_CHARS));
  });
  return lines.join("\n");
}

export function defaultTitle(symbols: string[]): string {
  return `Research Report: ${symbols.length > 0 ? symbols.join(", ") : "Prompted"}`;
}

/** Report synthesis through an OpenAI-compatible chat completions endpoint. */
export class OpenAISynthesizer {
  constructor(private config: LlmConfig) {}

  async synthesizeReport(
    context: ContextBundle,
    request: SynthesisRequest,
    signal: AbortSignal,
  ): Promise<ReportDraft> {
    const model =
      request.deepResearch && this.config.deepResearchModel
        ? this.config.deepResearchModel
        : this.config.model;

    log.info({ model, sources: context.documents.length }, "synthesizing report");

    const response = await fetch(`${this.config.baseUrl.replace(/\/+$/, "")}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model,
        temperature: 0.2,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: buildUserPrompt(context, request) },
        ],
      }),
      signal,
    });

    if (!response.ok) {
      const body = await response.text();
      log.error({ status: response.status, body: body.slice(0, 500) }, "LLM API error");
      if (isContentPolicyRejection(body)) {
        throw new PermanentError("request rejected by content policy");
      }
      throw httpError("llm", response.status);
    }

    const completion = CompletionSchema.safeParse(await response.json());
    if (!completion.success) {
      throw new TransientError("llm returned an unexpected response");
    }

    const choice = completion.data.choices[0];
    if (choice.finish_reason === "content_filter") {
      throw new PermanentError("response blocked by content filter");
    }

    const report = parseModelReport(choice.message.content);
    const citations: Citation[] =
      report.citations && report.citations.length > 0
        ? report.citations
        : context.documents.map((doc) => ({ title: doc.title, url: doc.url }));

    return {
      title: report.title ?? defaultTitle(request.symbols),
      summaryMarkdown: report.markdown,
      citations,
    };
  }
}

function parseModelReport(content: string | null): z.infer<typeof ModelReportSchema> {
  let raw: unknown;
  try {
    raw = JSON.parse(content ?? "");
  } catch {
    throw new TransientError("llm output was not valid JSON");
  }
  const parsed = ModelReportSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TransientError("llm output did not match the report format");
  }
  return parsed.data;
}

function isContentPolicyRejection(body: string): boolean {
  try {
    const parsed = ProviderErrorSchema.safeParse(JSON.parse(body));
    return parsed.success && parsed.data.error.code === "content_policy_violation";
  } catch {
    return false;
  }
}
