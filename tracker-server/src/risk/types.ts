import type { Strategy } from "../positions/types.js";

export const RISK_LEVELS = ["low", "medium", "high", "extreme"] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export const EXPIRATION_BUCKETS = ["< 7 days", "7-14 days", "15-30 days", "> 30 days"] as const;
export type ExpirationBucket = (typeof EXPIRATION_BUCKETS)[number];

export interface Greeks {
  delta: number;
  gamma: number;
  theta: number;
  vega: number;
}

export interface PositionRiskReport {
  position_id: string;
  symbol: string;
  strategy: Strategy;
  risk_level: RiskLevel;
  greeks: Greeks;
  max_profit: number;
  max_loss: number;
  /** Infinity when max_loss is 0. */
  risk_reward_ratio: number;
  probabilities: {
    profit: number;
    assignment: number;
  };
  days_to_expiration: number;
}

/** Portfolio field names are camelCase for compatibility with existing consumers. */
export interface PortfolioRiskReport {
  totalRisk: number;
  maxLoss: number;
  diversification: number;
  risk_distribution: Record<RiskLevel, number>;
  sectorExposure: Record<string, number>;
  riskByStrategy: Partial<Record<Strategy, number>>;
  riskByExpiration: Record<ExpirationBucket, number>;
}

export interface MarketQuote {
  price: number;
  /** Annualized implied volatility, e.g. 0.25. */
  volatility?: number;
}

export type MarketSnapshot = ReadonlyMap<string, MarketQuote>;
