import { z } from "zod";
import type { PricesConfig } from "../config.js";
import { TransientError, httpError, toActivityError } from "../activities/errors.js";
import type { PriceMap, PriceProvider, Quote } from "./types.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("prices");

export const MAX_PRICE_SYMBOLS = 50;

/** Provider ticker suffix per exchange. Unlisted exchanges use the bare symbol. */
const EXCHANGE_SUFFIX: Record<string, string> = {
  NSE: ".NS",
  BSE: ".BO",
};

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({
            regularMarketPrice: z.number().nullable().optional(),
          }),
        }),
      )
      .nullable(),
  }),
});

export function providerTicker(quote: Quote): string {
  const suffix = quote.exchange ? (EXCHANGE_SUFFIX[quote.exchange.toUpperCase()] ?? "") : "";
  return `${quote.symbol}${suffix}`;
}

export function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Current prices from a Yahoo Finance compatible chart API. A symbol that
 * cannot be priced maps to null; the call as a whole never fails.
 */
export class ChartPriceProvider implements PriceProvider {
  constructor(private config: PricesConfig) {}

  async fetchPrices(quotes: Quote[], signal?: AbortSignal): Promise<PriceMap> {
    const unique = new Map<string, Quote>();
    for (const quote of quotes) {
      if (!unique.has(quote.symbol)) unique.set(quote.symbol, quote);
    }
    const batch = [...unique.values()].slice(0, MAX_PRICE_SYMBOLS);

    const entries = await Promise.all(
      batch.map(async (quote): Promise<[string, number | null]> => {
        try {
          return [quote.symbol, await this.fetchPrice(quote, signal)];
        } catch (e) {
          const error = toActivityError(e);
          log.warn({ symbol: quote.symbol, kind: error.kind, error: error.message }, "price lookup failed");
          return [quote.symbol, null];
        }
      }),
    );
    return Object.fromEntries(entries);
  }

  private async fetchPrice(quote: Quote, signal?: AbortSignal): Promise<number | null> {
    const url = new URL(`/v8/finance/chart/${encodeURIComponent(providerTicker(quote))}`, this.config.endpoint);
    url.searchParams.set("range", "1d");
    url.searchParams.set("interval", "1d");

    const response = await fetch(url, { signal });
    if (!response.ok) {
      throw httpError("prices", response.status);
    }

    const parsed = ChartResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TransientError("prices returned an unexpected response");
    }

    const price = parsed.data.chart.result?.[0]?.meta.regularMarketPrice;
    return price && price > 0 ? roundPrice(price) : null;
  }
}
