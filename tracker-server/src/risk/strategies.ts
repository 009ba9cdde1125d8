import { isStrategy, type Position, type Strategy } from "../positions/types.js";
import { UnrecognizedStrategyError } from "../utils/errors.js";
import type { OptionInput, OptionType, PricingModel } from "./pricing.js";

export const CONTRACT_MULTIPLIER = 100;

export interface StrategyHandler {
  /** Type of the option written by the strategy. */
  optionType: OptionType;
  maxProfit(position: Position): number;
  maxLoss(position: Position): number;
  /** Probability the written option finishes in the money. */
  assignmentProbability(model: PricingModel, option: OptionInput): number;
  /** Probability the underlying finishes past breakeven on the profitable side. */
  profitProbability(model: PricingModel, option: OptionInput, position: Position): number;
}

function premiumPerShare(position: Position): number {
  return position.premium_received / (position.quantity * CONTRACT_MULTIPLIER);
}

/** Stock cost per share behind a covered call; `entry_price` is per contract. */
function costPerShare(position: Position): number {
  return position.entry_price / CONTRACT_MULTIPLIER;
}

const coveredCall: StrategyHandler = {
  optionType: "call",
  maxProfit: (p) => p.premium_received,
  maxLoss: (p) => p.entry_price * p.quantity - p.premium_received,
  assignmentProbability: (model, option) => model.probabilityAbove(option, option.strike),
  // Profitable while the stock ends above its cost less the premium kept.
  profitProbability: (model, option, p) =>
    model.probabilityAbove(option, costPerShare(p) - premiumPerShare(p)),
};

const cashSecuredPut: StrategyHandler = {
  optionType: "put",
  maxProfit: (p) => p.premium_received,
  maxLoss: (p) => p.strike_price * p.quantity * CONTRACT_MULTIPLIER - p.premium_received,
  assignmentProbability: (model, option) => model.probabilityBelow(option, option.strike),
  profitProbability: (model, option, p) =>
    model.probabilityAbove(option, p.strike_price - premiumPerShare(p)),
};

export const STRATEGY_HANDLERS: Readonly<Record<Strategy, StrategyHandler>> = {
  covered_call: coveredCall,
  cash_secured_put: cashSecuredPut,
};

/**
 * Looks up the handler for a strategy value that may come from outside the
 * type system (storage, broker payloads).
 */
export function strategyHandler(strategy: string): StrategyHandler {
  if (!isStrategy(strategy)) {
    throw new UnrecognizedStrategyError(strategy);
  }
  return STRATEGY_HANDLERS[strategy];
}
