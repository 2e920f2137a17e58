import { z } from "zod";
import type { SearchConfig } from "../config.js";
import type { ContextBundle, SourceDocument } from "./types.js";
import { PermanentError, TransientError, httpError } from "./errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("search");

const WebSearchResponseSchema = z.object({
  webPages: z
    .object({
      value: z.array(
        z.object({
          name: z.string().optional(),
          url: z.string().optional(),
          snippet: z.string().optional(),
        }),
      ),
    })
    .optional(),
});

/** Query used to gather background material for one ticker symbol. */
export function symbolQuery(symbol: string): string {
  return `${symbol} stock latest news earnings financial results analysis`;
}

/**
 * Context provider backed by a web search API (Bing v7 response shape).
 * Issues one query for the prompt and one per symbol, then de-duplicates
 * results by URL, keeping the first occurrence.
 */
export class WebSearchProvider {
  constructor(
    private config: SearchConfig,
    private now: () => Date = () => new Date(),
  ) {}

  async fetchContext(query: string, symbols: string[], signal: AbortSignal): Promise<ContextBundle> {
    const queries: string[] = [];
    const prompt = query.trim();
    if (prompt) queries.push(prompt);
    for (const symbol of symbols) {
      const trimmed = symbol.trim();
      if (trimmed) queries.push(symbolQuery(trimmed));
    }

    if (queries.length === 0) {
      throw new PermanentError("research request needs a prompt or at least one symbol");
    }

    const fetchedAt = this.now().toISOString();
    if (!this.config.apiKey) {
      log.warn("no search API key configured, continuing without sources");
      return { documents: [], fetchedAt };
    }

    const documents: SourceDocument[] = [];
    const seen = new Set<string>();
    for (const q of queries) {
      for (const doc of await this.search(q, signal)) {
        if (seen.has(doc.url)) continue;
        seen.add(doc.url);
        documents.push(doc);
      }
    }

    log.info({ queries: queries.length, documents: documents.length }, "context fetched");
    return { documents, fetchedAt };
  }

  private async search(query: string, signal: AbortSignal): Promise<SourceDocument[]> {
    const topK = Math.max(1, this.config.topK);
    const url = new URL("/v7.0/search", this.config.endpoint);
    url.searchParams.set("q", query);
    url.searchParams.set("count", String(topK));
    url.searchParams.set("textDecorations", "false");
    url.searchParams.set("safeSearch", "Moderate");

    const response = await fetch(url, {
      headers: { "Ocp-Apim-Subscription-Key": this.config.apiKey ?? "" },
      signal,
    });

    if (!response.ok) {
      const body = await response.text();
      log.error({ status: response.status, body: body.slice(0, 500) }, "search API error");
      throw httpError("search", response.status);
    }

    const parsed = WebSearchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TransientError("search returned an unexpected response");
    }

    const documents: SourceDocument[] = [];
    for (const item of parsed.data.webPages?.value ?? []) {
      const link = item.url?.trim();
      if (!link) continue;
      documents.push({
        title: item.name?.trim() || link,
        url: link,
        text: item.snippet?.trim() ?? "",
      });
      if (documents.length >= topK) break;
    }
    return documents;
  }
}
