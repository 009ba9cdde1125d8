import type { PositionStore } from "../positions/store.js";
import type { Position, Strategy } from "../positions/types.js";
import { CONTRACT_MULTIPLIER } from "../risk/strategies.js";
import type { BrokerClient } from "../utils/broker-client.js";
import { log, logWarn } from "../utils/logger.js";
import { parseOccSymbol } from "./occ.js";
import { brokerPositionsSchema, type BrokerPosition } from "./schemas.js";

export interface ImportResult {
  imported: Position[];
  skipped: string[];
}

function isShortOption(p: BrokerPosition): boolean {
  return p.qty < 0 && (p.asset_class === undefined || p.asset_class === "us_option");
}

/**
 * Maps broker payloads to tracked positions. Only short option legs are
 * imported. A short put maps to cash_secured_put. A short call maps to
 * covered_call only while long stock in the underlying covers every
 * contract; an uncovered call is skipped.
 *
 * `entry_price` is the per-contract cost basis: 100 shares at the stock's
 * average entry for a covered call, the cash set aside at the strike for a
 * put.
 */
export function mapBrokerPositions(
  payload: readonly BrokerPosition[],
  now: Date
): ImportResult {
  const stockLots = new Map<string, { shares: number; avgEntryPrice: number }>();
  for (const p of payload) {
    if (p.asset_class === "us_equity" && p.qty > 0) {
      stockLots.set(p.symbol, { shares: p.qty, avgEntryPrice: p.avg_entry_price });
    }
  }

  const imported: Position[] = [];
  const skipped: string[] = [];

  for (const p of payload) {
    if (p.asset_class === "us_equity") continue;

    const contract = parseOccSymbol(p.symbol);
    if (!contract || !isShortOption(p)) {
      skipped.push(p.symbol);
      continue;
    }

    const quantity = Math.abs(p.qty);
    let strategy: Strategy;
    let entryPrice: number;
    if (contract.optionType === "call") {
      const lot = stockLots.get(contract.underlying);
      const sharesNeeded = quantity * CONTRACT_MULTIPLIER;
      if (!lot || lot.shares < sharesNeeded) {
        skipped.push(p.symbol);
        continue;
      }
      lot.shares -= sharesNeeded;
      strategy = "covered_call";
      entryPrice = lot.avgEntryPrice * CONTRACT_MULTIPLIER;
    } else {
      strategy = "cash_secured_put";
      entryPrice = contract.strike * CONTRACT_MULTIPLIER;
    }
    const entryDate = now.getTime() > contract.expiration.getTime() ? contract.expiration : now;

    imported.push({
      id: `broker_${p.symbol}`,
      symbol: contract.underlying,
      strategy,
      quantity,
      entry_price: entryPrice,
      strike_price: contract.strike,
      premium_received: Math.abs(p.avg_entry_price) * CONTRACT_MULTIPLIER * quantity,
      entry_date: entryDate,
      expiration_date: contract.expiration,
      is_open: true,
      status: "open",
      notes: `Imported from broker on ${now.toISOString().split("T")[0]}`,
    });
  }

  return { imported, skipped };
}

export async function importBrokerPositions(
  client: BrokerClient,
  store: PositionStore,
  now: Date = new Date()
): Promise<ImportResult> {
  const payload = brokerPositionsSchema.parse(await client.getPositions());
  const result = mapBrokerPositions(payload, now);

  const saved: Position[] = [];
  for (const position of result.imported) {
    const existing = await store.find(position.id);
    saved.push(
      await store.upsert({
        ...position,
        sector: existing?.sector,
        notes: existing?.notes ?? position.notes,
        entry_date: existing?.entry_date ?? position.entry_date,
      })
    );
  }

  if (result.skipped.length > 0) {
    logWarn(`Skipped ${result.skipped.length} broker positions: ${result.skipped.join(", ")}`);
  }
  log(`Imported ${saved.length} option positions from broker`);
  return { imported: saved, skipped: result.skipped };
}
