import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";
import { getPositionStore } from "./positions/store.js";
import { getBrokerClient } from "./utils/broker-client.js";
import { isPaperTrading } from "./utils/config.js";
import { log } from "./utils/logger.js";

const server = createServer({
  store: getPositionStore(),
  getBrokerClient,
});

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log(`Options Tracker MCP Server running (paper=${isPaperTrading()})`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
