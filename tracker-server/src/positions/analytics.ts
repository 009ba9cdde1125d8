import type { Position } from "./types.js";

const CONTRACT_MULTIPLIER = 100;

export interface TradeSummary {
  total_profit: number;
  win_rate: number;
  profit_factor: number;
  average_win: number;
  average_loss: number;
  total_trades: number;
  winning_trades: number;
  losing_trades: number;
  open_positions: number;
}

/**
 * Realized P&L of buying back a written option at `closePrice` per share.
 */
export function closingProfitLoss(position: Position, closePrice: number): number {
  return position.premium_received - closePrice * position.quantity * CONTRACT_MULTIPLIER;
}

export function summarizeTrades(positions: readonly Position[]): TradeSummary {
  const results = positions
    .filter((p) => p.status === "closed")
    .map((p) => p.profit_loss ?? 0);

  const wins = results.filter((pl) => pl > 0);
  const losses = results.filter((pl) => pl < 0);
  const grossWin = wins.reduce((sum, pl) => sum + pl, 0);
  const grossLoss = Math.abs(losses.reduce((sum, pl) => sum + pl, 0));

  let profitFactor = 0;
  if (grossLoss > 0) profitFactor = grossWin / grossLoss;
  else if (grossWin > 0) profitFactor = Infinity;

  return {
    total_profit: results.reduce((sum, pl) => sum + pl, 0),
    win_rate: results.length > 0 ? wins.length / results.length : 0,
    profit_factor: profitFactor,
    average_win: wins.length > 0 ? grossWin / wins.length : 0,
    average_loss: losses.length > 0 ? grossLoss / losses.length : 0,
    total_trades: results.length,
    winning_trades: wins.length,
    losing_trades: losses.length,
    open_positions: positions.filter((p) => p.is_open).length,
  };
}
