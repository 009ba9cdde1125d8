import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { MarketDataProvider } from "../market/market-data.js";
import { errorResult, jsonResult } from "./result.js";

export function registerMarketDataTools(server: McpServer, marketData: MarketDataProvider): void {
  server.tool(
    "get_quote",
    "Latest trade price for one or more underlying symbols",
    {
      symbols: z.string().min(1).describe("Comma-separated symbols (e.g. AAPL,MSFT)"),
    },
    async ({ symbols }) => {
      try {
        const list = symbols
          .split(",")
          .map((s) => s.trim().toUpperCase())
          .filter((s) => s.length > 0);

        const quotes: Record<string, number> = {};
        for (const symbol of list) {
          quotes[symbol] = await marketData.getLatestPrice(symbol);
        }
        return jsonResult({ quotes, timestamp: new Date().toISOString() });
      } catch (err) {
        return errorResult("get_quote", `fetching quotes for ${symbols}`, err);
      }
    }
  );
}
