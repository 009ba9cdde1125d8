import type { RiskConfig, RiskLevelTier } from "../utils/config.js";
import type { RiskLevel } from "./types.js";

export interface ClassifierInput {
  assignmentProbability: number;
  maxLoss: number;
}

function meets(input: ClassifierInput, tier: RiskLevelTier): boolean {
  return (
    input.assignmentProbability >= tier.minAssignmentProbability ||
    input.maxLoss >= tier.minMaxLoss
  );
}

/**
 * Buckets a position by the most severe tier it reaches. Tiers are checked
 * from extreme down; a position reaching none is low.
 */
export function classifyRiskLevel(
  input: ClassifierInput,
  tiers: RiskConfig["tiers"]
): RiskLevel {
  if (meets(input, tiers.extreme)) return "extreme";
  if (meets(input, tiers.high)) return "high";
  if (meets(input, tiers.medium)) return "medium";
  return "low";
}
