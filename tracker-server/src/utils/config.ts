/**
 * Configuration loaded from environment variables.
 */

export type DiscountMode = "flat" | "diversification";

export interface RiskLevelTier {
  /** Assignment probability at or above which the tier applies. */
  minAssignmentProbability: number;
  /** Max loss at or above which the tier applies. */
  minMaxLoss: number;
}

export interface RiskConfig {
  riskFreeRate: number;
  defaultVolatility: number;
  correlationDiscount: number;
  discountMode: DiscountMode;
  diversificationSectorTarget: number;
  tiers: {
    extreme: RiskLevelTier;
    high: RiskLevelTier;
    medium: RiskLevelTier;
  };
}

export interface StoreConfig {
  positionsFile?: string;
}

type Env = Record<string, string | undefined>;

function num(env: Env, key: string, fallback: string): number {
  const value = parseFloat(env[key] || fallback);
  return Number.isFinite(value) ? value : parseFloat(fallback);
}

export function getRiskConfig(env: Env = process.env): RiskConfig {
  return {
    riskFreeRate: num(env, "RISK_FREE_RATE", "0.04"),
    defaultVolatility: num(env, "DEFAULT_VOLATILITY", "0.30"),
    correlationDiscount: num(env, "CORRELATION_DISCOUNT", "0.20"),
    discountMode:
      (env.PORTFOLIO_DISCOUNT_MODE || "flat").toLowerCase() === "diversification"
        ? "diversification"
        : "flat",
    diversificationSectorTarget: num(env, "DIVERSIFICATION_SECTOR_TARGET", "10"),
    tiers: {
      extreme: {
        minAssignmentProbability: num(env, "RISK_EXTREME_ASSIGNMENT_PROB", "0.70"),
        minMaxLoss: num(env, "RISK_EXTREME_MAX_LOSS", "50000"),
      },
      high: {
        minAssignmentProbability: num(env, "RISK_HIGH_ASSIGNMENT_PROB", "0.50"),
        minMaxLoss: num(env, "RISK_HIGH_MAX_LOSS", "25000"),
      },
      medium: {
        minAssignmentProbability: num(env, "RISK_MEDIUM_ASSIGNMENT_PROB", "0.25"),
        minMaxLoss: num(env, "RISK_MEDIUM_MAX_LOSS", "10000"),
      },
    },
  };
}

export function getStoreConfig(env: Env = process.env): StoreConfig {
  return {
    positionsFile: env.POSITIONS_FILE || undefined,
  };
}

export function isPaperTrading(env: Env = process.env): boolean {
  return (env.PAPER_TRADING || "true").toLowerCase() === "true";
}
