import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { OpenAISynthesizer, buildUserPrompt, defaultTitle } from "./synthesize.js";
import { PermanentError, TransientError } from "./errors.js";
import type { ContextBundle, SynthesisRequest } from "./types.js";

vi.mock("../util/logger.js", () => ({
  getLogger: () => ({ info: () => {}, warn: () => {}, error: () => {}, debug: () => {} }),
}));

const context: ContextBundle = {
  documents: [
    { title: "Chip demand", url: "https://news.test/1", text: "Demand is up." },
    { title: "Earnings", url: "https://news.test/2", text: "" },
  ],
  fetchedAt: "2026-03-02T09:00:00.000Z",
};

const request: SynthesisRequest = {
  prompt: "Outlook for GPU makers",
  symbols: ["NVDA", "AMD"],
  deepResearch: false,
};

function completion(content: string | null, finishReason = "stop"): Response {
  return new Response(
    JSON.stringify({ choices: [{ finish_reason: finishReason, message: { content } }] }),
    { status: 200, headers: { "Content-Type": "application/json" } },
  );
}

describe("buildUserPrompt", () => {
  it("lists the request, symbols and numbered sources", () => {
    expect(buildUserPrompt(context, request)).toBe(
      [
        "Research request: Outlook for GPU makers",
        "Symbols: NVDA, AMD",
        "",
        "Sources:",
        "[1] Chip demand - https://news.test/1",
        "Demand is up.",
        "[2] Earnings - https://news.test/2",
      ].join("\n"),
    );
  });

  it("notes when there are no sources", () => {
    const prompt = buildUserPrompt({ documents: [], fetchedAt: "" }, { ...request, symbols: [] });
    expect(prompt).toBe(
      ["Research request: Outlook for GPU makers", "", "Sources:", "(none found; rely on general knowledge and say so)"].join("\n"),
    );
  });
});

describe("defaultTitle", () => {
  it("names the symbols or falls back to Prompted", () => {
    expect(defaultTitle(["AAPL"])).toBe("Research Report: AAPL");
    expect(defaultTitle([])).toBe("Research Report: Prompted");
  });
});

describe("OpenAISynthesizer", () => {
  const fetchMock = vi.fn<typeof fetch>();
  const signal = new AbortController().signal;
  const synthesizer = new OpenAISynthesizer({
    baseUrl: "https://llm.test.local/v1/",
    apiKey: "test-key",
    model: "small-model",
    deepResearchModel: "deep-model",
  });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function sentBody(): { model: string; messages: Array<{ role: string; content: string }> } {
    const init = fetchMock.mock.calls[0][1];
    return JSON.parse(String(init?.body));
  }

  it("returns the model's report", async () => {
    fetchMock.mockResolvedValueOnce(
      completion(
        JSON.stringify({
          title: "GPU Outlook",
          markdown: "# GPU Outlook\n\nStrong demand [1].",
          citations: [{ title: "Chip demand", url: "https://news.test/1" }],
        }),
      ),
    );

    const draft = await synthesizer.synthesizeReport(context, request, signal);

    expect(String(fetchMock.mock.calls[0][0])).toBe("https://llm.test.local/v1/chat/completions");
    expect(sentBody().model).toBe("small-model");
    expect(draft).toEqual({
      title: "GPU Outlook",
      summaryMarkdown: "# GPU Outlook\n\nStrong demand [1].",
      citations: [{ title: "Chip demand", url: "https://news.test/1" }],
    });
  });

  it("uses the deep research model when requested", async () => {
    fetchMock.mockResolvedValueOnce(completion(JSON.stringify({ title: "T", markdown: "body" })));

    await synthesizer.synthesizeReport(context, { ...request, deepResearch: true }, signal);

    expect(sentBody().model).toBe("deep-model");
  });

  it("falls back to context citations and a default title", async () => {
    fetchMock.mockResolvedValueOnce(completion(JSON.stringify({ markdown: "body" })));

    const draft = await synthesizer.synthesizeReport(context, request, signal);

    expect(draft.title).toBe("Research Report: NVDA, AMD");
    expect(draft.citations).toEqual([
      { title: "Chip demand", url: "https://news.test/1" },
      { title: "Earnings", url: "https://news.test/2" },
    ]);
  });

  it("treats a content filter stop as permanent", async () => {
    fetchMock.mockResolvedValueOnce(completion(null, "content_filter"));

    await expect(synthesizer.synthesizeReport(context, request, signal)).rejects.toBeInstanceOf(
      PermanentError,
    );
  });

  it("treats a content policy error response as permanent", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ error: { code: "content_policy_violation", message: "no" } }), {
        status: 400,
      }),
    );

    await expect(synthesizer.synthesizeReport(context, request, signal)).rejects.toThrow(
      "request rejected by content policy",
    );
  });

  it("treats rate limiting as transient", async () => {
    fetchMock.mockResolvedValueOnce(new Response("{}", { status: 429 }));

    await expect(synthesizer.synthesizeReport(context, request, signal)).rejects.toBeInstanceOf(
      TransientError,
    );
  });

  it("treats malformed model output as transient", async () => {
    fetchMock.mockResolvedValueOnce(completion("not json"));

    await expect(synthesizer.synthesizeReport(context, request, signal)).rejects.toThrow(
      "llm output was not valid JSON",
    );
  });

  it("treats output missing the markdown body as transient", async () => {
    fetchMock.mockResolvedValueOnce(completion(JSON.stringify({ title: "only a title" })));

    await expect(synthesizer.synthesizeReport(context, request, signal)).rejects.toThrow(
      "llm output did not match the report format",
    );
  });
});
