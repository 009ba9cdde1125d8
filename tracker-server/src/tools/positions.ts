import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { summarizeTrades } from "../positions/analytics.js";
import type { PositionStore } from "../positions/store.js";
import { positionFieldsSchema } from "../positions/types.js";
import { errorResult, jsonResult, textResult } from "./result.js";

const positionId = z.string().min(1).describe("Tracked position ID");

export function registerPositionTools(server: McpServer, store: PositionStore): void {
  server.tool(
    "create_position",
    "Record a new covered call or cash-secured put position",
    positionFieldsSchema,
    async (params) => {
      try {
        const position = await store.create(params);
        return jsonResult(position);
      } catch (err) {
        return errorResult("create_position", "creating position", err);
      }
    }
  );

  server.tool(
    "get_positions",
    "List tracked positions. Filter by status (open, closed, all). Defaults to all.",
    {
      status: z
        .enum(["open", "closed", "all"])
        .optional()
        .describe("Position status filter. Defaults to 'all'."),
    },
    async ({ status }) => {
      try {
        const positions = await store.list(status || "all");
        return jsonResult(positions);
      } catch (err) {
        return errorResult("get_positions", "fetching positions", err);
      }
    }
  );

  server.tool(
    "get_position",
    "Get a single tracked position by ID",
    { position_id: positionId },
    async ({ position_id }) => {
      try {
        return jsonResult(await store.get(position_id));
      } catch (err) {
        return errorResult("get_position", `fetching position ${position_id}`, err);
      }
    }
  );

  server.tool(
    "update_position",
    "Update the sector or notes of a tracked position",
    {
      position_id: positionId,
      sector: z.string().min(1).nullable().optional().describe("Sector classification; null clears it"),
      notes: z.string().nullable().optional().describe("Free-form notes; null clears them"),
    },
    async ({ position_id, sector, notes }) => {
      try {
        return jsonResult(await store.update(position_id, { sector, notes }));
      } catch (err) {
        return errorResult("update_position", `updating position ${position_id}`, err);
      }
    }
  );

  server.tool(
    "close_position",
    "Close a tracked position by buying back the option. Realized P&L is premium received minus buy-back cost.",
    {
      position_id: positionId,
      close_price: z.number().nonnegative().describe("Buy-back price per share"),
      close_date: z.coerce
        .date()
        .optional()
        .describe("Close timestamp (ISO 8601). Defaults to now."),
      notes: z.string().optional().describe("Closing notes"),
    },
    async ({ position_id, close_price, close_date, notes }) => {
      try {
        const position = await store.close(position_id, { close_price, close_date, notes });
        return jsonResult(position);
      } catch (err) {
        return errorResult("close_position", `closing position ${position_id}`, err);
      }
    }
  );

  server.tool(
    "delete_position",
    "Delete a tracked position. This is irreversible.",
    { position_id: positionId },
    async ({ position_id }) => {
      try {
        await store.delete(position_id);
        return textResult(`Position ${position_id} deleted.`);
      } catch (err) {
        return errorResult("delete_position", `deleting position ${position_id}`, err);
      }
    }
  );

  server.tool(
    "get_analytics_summary",
    "Trade statistics over closed positions: total profit, win rate, profit factor, average win and loss",
    {},
    async () => {
      try {
        return jsonResult(summarizeTrades(await store.list("all")));
      } catch (err) {
        return errorResult("get_analytics_summary", "computing analytics summary", err);
      }
    }
  );
}
