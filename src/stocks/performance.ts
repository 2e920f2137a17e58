import type { PriceMap, TrackedStock, TrackedStockPerformance } from "./types.js";
import { roundPrice } from "./prices.js";

/** Change since the recommendation, in price and percent, rounded to cents / 0.01%. */
export function withPerformance(stock: TrackedStock, prices: PriceMap): TrackedStockPerformance {
  const currentPrice = prices[stock.symbol] ?? null;
  if (currentPrice === null || stock.recommendationPrice <= 0) {
    return { ...stock, currentPrice, change: null, changePct: null };
  }
  const change = currentPrice - stock.recommendationPrice;
  return {
    ...stock,
    currentPrice,
    change: roundPrice(change),
    changePct: roundPrice((change / stock.recommendationPrice) * 100),
  };
}
