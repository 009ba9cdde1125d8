/**
 * Portfolio-level risk aggregation over the open positions of the book.
 * Every percentage breakdown resolves to zero or empty on a zero total.
 */

import type { Position, Strategy } from "../positions/types.js";
import type { RiskConfig } from "../utils/config.js";
import { computePositionRisk, daysToExpiration, type RiskContext } from "./position-risk.js";
import {
  EXPIRATION_BUCKETS,
  RISK_LEVELS,
  type ExpirationBucket,
  type PortfolioRiskReport,
  type RiskLevel,
} from "./types.js";

const OTHER_SECTOR = "Other";

interface AnalyzedPosition {
  position: Position;
  maxLoss: number;
  daysToExpiration: number;
  riskLevel: RiskLevel;
}

function pct(part: number, total: number): number {
  return (part / total) * 100;
}

export function expirationBucket(days: number): ExpirationBucket {
  if (days < 7) return "< 7 days";
  if (days < 14) return "7-14 days";
  if (days <= 30) return "15-30 days";
  return "> 30 days";
}

export function sectorExposure(positions: readonly Position[]): Record<string, number> {
  const notional = new Map<string, number>();
  let total = 0;

  for (const p of positions) {
    const value = p.entry_price * p.quantity;
    const sector = p.sector || OTHER_SECTOR;
    notional.set(sector, (notional.get(sector) ?? 0) + value);
    total += value;
  }

  const exposure: Record<string, number> = {};
  if (total <= 0) return exposure;
  for (const [sector, value] of notional) {
    exposure[sector] = pct(value, total);
  }
  return exposure;
}

function strategyDistribution(
  analyzed: readonly AnalyzedPosition[],
  totalRisk: number
): Partial<Record<Strategy, number>> {
  const distribution: Partial<Record<Strategy, number>> = {};
  for (const a of analyzed) {
    const strategy = a.position.strategy;
    const share = totalRisk !== 0 ? pct(a.maxLoss, totalRisk) : 0;
    distribution[strategy] = (distribution[strategy] ?? 0) + share;
  }
  return distribution;
}

function expirationDistribution(
  analyzed: readonly AnalyzedPosition[],
  totalRisk: number
): Record<ExpirationBucket, number> {
  const buckets: Record<ExpirationBucket, number> = {
    "< 7 days": 0,
    "7-14 days": 0,
    "15-30 days": 0,
    "> 30 days": 0,
  };
  for (const a of analyzed) {
    buckets[expirationBucket(a.daysToExpiration)] += a.maxLoss;
  }

  if (totalRisk > 0) {
    for (const key of EXPIRATION_BUCKETS) buckets[key] = pct(buckets[key], totalRisk);
  } else {
    for (const key of EXPIRATION_BUCKETS) buckets[key] = 0;
  }
  return buckets;
}

function riskDistribution(analyzed: readonly AnalyzedPosition[]): Record<RiskLevel, number> {
  const levels: Record<RiskLevel, number> = { low: 0, medium: 0, high: 0, extreme: 0 };
  for (const a of analyzed) levels[a.riskLevel] += 1;

  const total = analyzed.length;
  if (total > 0) {
    for (const level of RISK_LEVELS) levels[level] = pct(levels[level], total);
  }
  return levels;
}

/** Distinct named sectors over the target count, saturating at 1. */
export function diversificationScore(positions: readonly Position[], sectorTarget: number): number {
  const sectors = new Set(positions.filter((p) => p.sector).map((p) => p.sector));
  if (sectorTarget <= 0) return sectors.size > 0 ? 1 : 0;
  return Math.min(sectors.size / sectorTarget, 1);
}

/**
 * Total risk less the correlation discount. In "diversification" mode the
 * discount is weighted by the diversification score.
 */
export function portfolioMaxLoss(
  totalRisk: number,
  diversification: number,
  config: Pick<RiskConfig, "correlationDiscount" | "discountMode">
): number {
  const discount =
    config.discountMode === "diversification"
      ? config.correlationDiscount * diversification
      : config.correlationDiscount;
  return totalRisk * (1 - discount);
}

export function computePortfolioRisk(
  positions: readonly Position[],
  ctx: RiskContext
): PortfolioRiskReport {
  const open = positions.filter((p) => p.is_open);

  const analyzed: AnalyzedPosition[] = open.map((position) => {
    const report = computePositionRisk(position, ctx);
    return {
      position,
      maxLoss: report.max_loss,
      daysToExpiration: daysToExpiration(position, ctx.now),
      riskLevel: report.risk_level,
    };
  });

  const totalRisk = analyzed.reduce((sum, a) => sum + a.maxLoss, 0);
  const diversification = diversificationScore(open, ctx.config.diversificationSectorTarget);

  return {
    totalRisk,
    maxLoss: portfolioMaxLoss(totalRisk, diversification, ctx.config),
    diversification,
    risk_distribution: riskDistribution(analyzed),
    sectorExposure: sectorExposure(open),
    riskByStrategy: strategyDistribution(analyzed, totalRisk),
    riskByExpiration: expirationDistribution(analyzed, totalRisk),
  };
}
