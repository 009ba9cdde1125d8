/**
 * Brokerage client singleton factory.
 * The Alpaca SDK's TS definitions are incomplete, so the instance is narrowed
 * to the calls this server makes and every payload is parsed with zod.
 */

import Alpaca from "@alpacahq/alpaca-trade-api";
import { isPaperTrading } from "./config.js";
import { log } from "./logger.js";

export interface BrokerClient {
  getAccount(): Promise<unknown>;
  getPositions(): Promise<unknown>;
  getLatestTrade(symbol: string): Promise<unknown>;
}

let _client: BrokerClient | null = null;

export function getBrokerClient(): BrokerClient {
  if (_client) return _client;

  const keyId = process.env.ALPACA_API_KEY_ID;
  const secretKey = process.env.ALPACA_API_SECRET_KEY;

  if (!keyId || !secretKey) {
    throw new Error("ALPACA_API_KEY_ID and ALPACA_API_SECRET_KEY must be set");
  }

  const paper = isPaperTrading();
  log(`Initializing Alpaca client (paper=${paper})`);

  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  const client: BrokerClient = new (Alpaca as any)({
    keyId,
    secretKey,
    paper,
    usePolygon: false,
  });
  _client = client;

  return _client;
}
