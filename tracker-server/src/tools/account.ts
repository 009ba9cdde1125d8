import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { importBrokerPositions } from "../broker/import.js";
import { brokerAccountSchema } from "../broker/schemas.js";
import type { PositionStore } from "../positions/store.js";
import type { BrokerClient } from "../utils/broker-client.js";
import { isPaperTrading } from "../utils/config.js";
import { errorResult, jsonResult } from "./result.js";

export function registerAccountTools(
  server: McpServer,
  getClient: () => BrokerClient,
  store: PositionStore
): void {
  server.tool(
    "get_account",
    "Get brokerage account info: buying power, cash, equity, portfolio value",
    {},
    async () => {
      try {
        const account = brokerAccountSchema.parse(await getClient().getAccount());

        return jsonResult({
          id: account.id,
          status: account.status,
          buying_power: account.buying_power.toFixed(2),
          options_buying_power: account.options_buying_power?.toFixed(2) ?? null,
          cash: account.cash.toFixed(2),
          portfolio_value: account.portfolio_value.toFixed(2),
          equity: account.equity.toFixed(2),
          paper_trading: isPaperTrading(),
        });
      } catch (err) {
        return errorResult("get_account", "fetching account", err);
      }
    }
  );

  server.tool(
    "import_broker_positions",
    "Import short option positions from the brokerage account as tracked covered calls and cash-secured puts",
    {},
    async () => {
      try {
        const result = await importBrokerPositions(getClient(), store);
        return jsonResult({
          imported: result.imported.length,
          skipped: result.skipped,
          positions: result.imported,
        });
      } catch (err) {
        return errorResult("import_broker_positions", "importing broker positions", err);
      }
    }
  );
}
