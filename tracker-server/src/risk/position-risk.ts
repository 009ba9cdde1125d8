import type { Position } from "../positions/types.js";
import type { RiskConfig } from "../utils/config.js";
import { classifyRiskLevel } from "./classifier.js";
import type { OptionInput, PricingModel } from "./pricing.js";
import { strategyHandler } from "./strategies.js";
import type { MarketSnapshot, PositionRiskReport } from "./types.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DAYS_PER_YEAR = 365;

export interface RiskContext {
  now: Date;
  market: MarketSnapshot;
  model: PricingModel;
  config: RiskConfig;
}

/** Whole days until expiration, rounded down. Negative once expired. */
export function daysToExpiration(position: Position, now: Date): number {
  return Math.floor((position.expiration_date.getTime() - now.getTime()) / MS_PER_DAY);
}

export function riskRewardRatio(maxProfit: number, maxLoss: number): number {
  return maxLoss === 0 ? Infinity : Math.abs(maxProfit / maxLoss);
}

/**
 * Unquoted symbols are priced at the strike with the default volatility.
 */
function optionInput(position: Position, ctx: RiskContext): OptionInput {
  const quote = ctx.market.get(position.symbol);
  const years =
    (position.expiration_date.getTime() - ctx.now.getTime()) / (MS_PER_DAY * DAYS_PER_YEAR);

  return {
    optionType: strategyHandler(position.strategy).optionType,
    spot: quote?.price ?? position.strike_price,
    strike: position.strike_price,
    timeToExpiration: Math.max(years, 0),
    volatility: quote?.volatility ?? ctx.config.defaultVolatility,
    riskFreeRate: ctx.config.riskFreeRate,
  };
}

function clampProbability(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

export function computePositionRisk(position: Position, ctx: RiskContext): PositionRiskReport {
  const handler = strategyHandler(position.strategy);
  const option = optionInput(position, ctx);

  const maxProfit = handler.maxProfit(position);
  const maxLoss = handler.maxLoss(position);
  const assignment = clampProbability(handler.assignmentProbability(ctx.model, option));
  const profit = clampProbability(handler.profitProbability(ctx.model, option, position));

  return {
    position_id: position.id,
    symbol: position.symbol,
    strategy: position.strategy,
    risk_level: classifyRiskLevel(
      { assignmentProbability: assignment, maxLoss },
      ctx.config.tiers
    ),
    greeks: ctx.model.greeks(option),
    max_profit: maxProfit,
    max_loss: maxLoss,
    risk_reward_ratio: riskRewardRatio(maxProfit, maxLoss),
    probabilities: { profit, assignment },
    days_to_expiration: daysToExpiration(position, ctx.now),
  };
}
