import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { RiskService } from "../risk/service.js";
import { errorResult, jsonResult } from "./result.js";

export function registerRiskTools(server: McpServer, risk: RiskService): void {
  server.tool(
    "get_position_risk",
    "Risk analysis for one position: Greeks, max profit/loss, risk/reward, probability of profit and assignment, risk level",
    {
      position_id: z.string().min(1).describe("Tracked position ID"),
    },
    async ({ position_id }) => {
      try {
        return jsonResult(await risk.getPositionRisk(position_id));
      } catch (err) {
        return errorResult("get_position_risk", `fetching risk for position ${position_id}`, err);
      }
    }
  );

  server.tool(
    "get_portfolio_risk",
    "Risk analysis across all open positions: total risk, correlation-adjusted max loss, diversification, and exposure by sector, strategy, expiration and risk level",
    {},
    async () => {
      try {
        return jsonResult(await risk.getPortfolioRisk());
      } catch (err) {
        return errorResult("get_portfolio_risk", "fetching portfolio risk", err);
      }
    }
  );
}
