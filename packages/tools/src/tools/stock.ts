import { z } from "zod";
import { defineTool } from "../tool.js";
import { roundTo, seededRandom } from "../seeded-random.js";

export const StockArgsSchema = z.object({
  symbol: z
    .string()
    .trim()
    .min(1)
    .transform((s) => s.toUpperCase()),
});

/** Reference prices; other symbols get a stable synthetic price. */
export const REFERENCE_PRICES: Readonly<Record<string, number>> = {
  MSFT: 431.2,
  AAPL: 229.85,
  GOOGL: 176.4,
  AMZN: 198.15,
  TSLA: 262.7,
  META: 573.3,
  NVDA: 128.9,
};

export type StockQuote = {
  readonly Symbol: string;
  readonly Price: number;
  readonly Change: number;
  readonly ChangePercent: number;
};

export function quoteStock(symbol: string): StockQuote {
  const price = roundTo(REFERENCE_PRICES[symbol] ?? 100 + seededRandom(symbol)() * 200, 2);
  const change = roundTo((seededRandom(`${symbol}:change`)() - 0.5) * 10, 2);
  return {
    Symbol: symbol,
    Price: price,
    Change: change,
    ChangePercent: roundTo((change / price) * 100, 2),
  };
}

export function formatQuote(quote: StockQuote): string {
  const sign = quote.Change >= 0 ? "+" : "";
  return `${quote.Symbol}: $${quote.Price.toFixed(2)} (${sign}${quote.Change.toFixed(2)}, ${quote.ChangePercent.toFixed(2)}%)`;
}

export const stockTool = defineTool({
  name: "get_stock_price",
  description: "Get the current stock price for a given ticker symbol.",
  parameters: {
    type: "object",
    properties: {
      symbol: { type: "string", description: "The stock ticker symbol, e.g. 'MSFT'" },
    },
    required: ["symbol"],
  },
  schema: StockArgsSchema,
  execute: ({ symbol }) => quoteStock(symbol),
});
