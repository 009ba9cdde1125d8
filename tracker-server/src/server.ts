import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { BrokerMarketData, type MarketDataProvider } from "./market/market-data.js";
import type { PositionStore } from "./positions/store.js";
import { RiskService } from "./risk/service.js";
import { registerAccountTools } from "./tools/account.js";
import { registerMarketDataTools } from "./tools/market-data.js";
import { registerPositionTools } from "./tools/positions.js";
import { registerRiskTools } from "./tools/risk.js";
import type { BrokerClient } from "./utils/broker-client.js";
import type { RiskConfig } from "./utils/config.js";

export interface ServerDeps {
  store: PositionStore;
  getBrokerClient: () => BrokerClient;
  marketData?: MarketDataProvider;
  riskConfig?: RiskConfig;
  clock?: () => Date;
}

export function createServer(deps: ServerDeps): McpServer {
  const server = new McpServer({
    name: "options-tracker",
    version: "1.0.0",
  });

  const marketData = deps.marketData ?? new BrokerMarketData(deps.getBrokerClient);
  const risk = new RiskService({
    store: deps.store,
    marketData,
    config: deps.riskConfig,
    clock: deps.clock,
  });

  registerPositionTools(server, deps.store);
  registerRiskTools(server, risk);
  registerAccountTools(server, deps.getBrokerClient, deps.store);
  registerMarketDataTools(server, marketData);

  return server;
}
