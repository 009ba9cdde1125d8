import { latestTradeSchema } from "../broker/schemas.js";
import type { MarketQuote, MarketSnapshot } from "../risk/types.js";
import type { BrokerClient } from "../utils/broker-client.js";
import { logWarn } from "../utils/logger.js";

export interface MarketDataProvider {
  getLatestPrice(symbol: string): Promise<number>;
}

export class BrokerMarketData implements MarketDataProvider {
  constructor(private readonly getClient: () => BrokerClient) {}

  async getLatestPrice(symbol: string): Promise<number> {
    const trade = latestTradeSchema.parse(
      await this.getClient().getLatestTrade(symbol.toUpperCase())
    );
    return trade.Price;
  }
}

/**
 * Quotes every distinct symbol. A symbol whose quote fails is left out of the
 * snapshot, and the engine prices it at the strike.
 */
export async function buildMarketSnapshot(
  provider: MarketDataProvider,
  symbols: Iterable<string>
): Promise<MarketSnapshot> {
  const snapshot = new Map<string, MarketQuote>();
  const unique = [...new Set(symbols)];

  const quotes = await Promise.allSettled(unique.map((s) => provider.getLatestPrice(s)));
  quotes.forEach((quote, i) => {
    const symbol = unique[i];
    if (quote.status === "fulfilled") {
      snapshot.set(symbol, { price: quote.value });
    } else {
      const reason = quote.reason instanceof Error ? quote.reason.message : String(quote.reason);
      logWarn(`Could not get latest trade for ${symbol}, pricing at strike: ${reason}`);
    }
  });

  return snapshot;
}
