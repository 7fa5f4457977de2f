/**
 * Types for aggregation, gate evaluation and adoption ranking.
 */

/**
 * The numeric view of one trial that the analysis reads. Flags are 0/1 so
 * rates are plain means; condition and tier stay free strings because
 * result files may carry values outside the registry.
 */
export interface AnalysisRecord {
  readonly condition: string;
  readonly tier: string;
  readonly taskSuccess: number;
  readonly testsPassed: number;
  readonly contextUtilized: number;
  readonly runtimeSeconds: number;
  readonly totalTokens: number;
  readonly estimatedCostUsd: number;
  readonly prReadinessScore: number;
  readonly judgeMaintainability: number;
  readonly judgeTestQuality: number;
}

export interface RecordFilter {
  condition?: string;
  tiers?: ReadonlySet<string> | readonly string[];
}

/**
 * Aggregate over any filtered subset. All zeros for an empty subset.
 */
export interface ConditionSummary {
  n: number;
  successRate: number;
  testsPassRate: number;
  avgPrReadiness: number;
  medianRuntime: number;
  medianTokens: number;
  medianCost: number;
  contextUtilizationRate: number;
  avgMaintainability: number;
  avgTestQuality: number;
}

export interface ConditionSummaryRow extends ConditionSummary {
  condition: string;
}

export interface GateThresholds {
  /** Minimum relative hard-tier success lift */
  minSuccessLift: number;
  /** Maximum relative easy-tier median runtime regression */
  maxRuntimeRegression: number;
  /** Lowest acceptable maintainability and test-quality delta */
  qualityTolerance: number;
  /** Cost regression allowed without justification */
  maxCostRegression: number;
  /** Quality-to-cost ratio that justifies a larger cost regression */
  minQualityCostRatio: number;
  costPenaltyWeight: number;
  runtimePenaltyWeight: number;
}

export interface GatePolicy {
  baseline: string;
  candidates: readonly string[];
  easyTiers: readonly string[];
  hardTiers: readonly string[];
  thresholds: GateThresholds;
}

export interface GateFlags {
  success: boolean;
  runtime: boolean;
  quality: boolean;
  cost: boolean;
}

/**
 * One candidate condition compared against the baseline.
 */
export interface GateEvaluation {
  condition: string;
  baselineHardTierSuccessRate: number;
  hardTierSuccessRate: number;
  /** Relative change of hard-tier success rate */
  hardTierSuccessLift: number;
  /** Absolute change of hard-tier success rate */
  hardTierQualityGain: number;
  /** Relative change of easy-tier median runtime */
  easyTierRuntimeRegression: number;
  maintainabilityDelta: number;
  testQualityDelta: number;
  /** Relative change of median cost */
  costRegression: number;
  /** May be +Infinity */
  qualityCostRatio: number;
  gates: GateFlags;
  gateCount: number;
  frontierScore: number;
}

export interface AdoptionDecision {
  recommendedCondition: string;
  adopt: boolean;
  recommended: GateEvaluation;
  /** Best first */
  candidates: GateEvaluation[];
}
