/** A stock recommendation being followed against its current market price. */
export interface TrackedStock {
  id: string;
  ownerId: string;
  symbol: string;
  /** Listing exchange, e.g. "NSE". Null for US listings. */
  exchange: string | null;
  reportId: string | null;
  reportTitle: string | null;
  /** YYYY-MM-DD */
  recommendationDate: string;
  recommendationPrice: number;
  createdAt: string;
}

export interface CreateTrackedStockInput {
  id: string;
  ownerId: string;
  symbol: string;
  exchange?: string | null;
  reportId?: string | null;
  reportTitle?: string | null;
  recommendationDate: string;
  recommendationPrice: number;
}

/** A tracked stock priced now. Price fields are null when no quote was available. */
export interface TrackedStockPerformance extends TrackedStock {
  currentPrice: number | null;
  change: number | null;
  changePct: number | null;
}

/** Symbol plus the exchange it trades on, as sent to a price provider. */
export interface Quote {
  symbol: string;
  exchange: string | null;
}

/** Current prices keyed by symbol; null when the symbol could not be priced. */
export type PriceMap = Record<string, number | null>;

export interface PriceProvider {
  fetchPrices(quotes: Quote[], signal?: AbortSignal): Promise<PriceMap>;
}

/** Raw `tracked_stocks` row as stored in SQLite. */
export interface TrackedStockRow {
  id: string;
  owner_id: string;
  symbol: string;
  exchange: string | null;
  report_id: string | null;
  report_title: string | null;
  recommendation_date: string;
  recommendation_price: number;
  created_at: string;
}
