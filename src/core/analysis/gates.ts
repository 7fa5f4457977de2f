/**
 * Gate evaluation of one candidate condition against the baseline.
 */
import { filterRecords, summarize } from './aggregate.js';
import { DEFAULT_GATE_POLICY } from './policy.js';
import type { AnalysisRecord, GateEvaluation, GateFlags, GatePolicy } from './types.js';

/**
 * (candidate - baseline) / baseline.
 *
 * A zero baseline has no meaningful ratio: no change reads as 0 and any
 * change reads as 1 (a full-magnitude swing). Gate thresholds are tuned
 * against this convention.
 */
export function relativeChange(candidate: number, baseline: number): number {
  if (baseline === 0) {
    return candidate === 0 ? 0 : 1;
  }
  return (candidate - baseline) / baseline;
}

/**
 * Quality gain bought per unit of cost regression. When cost did not rise,
 * a non-negative gain is unboundedly worth it and a loss is worth nothing.
 */
export function qualityCostRatio(qualityGain: number, costRegression: number): number {
  if (costRegression <= 0) {
    return qualityGain >= 0 ? Number.POSITIVE_INFINITY : 0;
  }
  return qualityGain / costRegression;
}

export function countGates(gates: GateFlags): number {
  return [gates.success, gates.runtime, gates.quality, gates.cost].filter(Boolean).length;
}

export function evaluateCondition(
  records: readonly AnalysisRecord[],
  condition: string,
  policy: GatePolicy = DEFAULT_GATE_POLICY
): GateEvaluation {
  const { thresholds } = policy;
  const baselineRecords = filterRecords(records, { condition: policy.baseline });
  const candidateRecords = filterRecords(records, { condition });

  const baselineEasy = summarize(filterRecords(baselineRecords, { tiers: policy.easyTiers }));
  const baselineHard = summarize(filterRecords(baselineRecords, { tiers: policy.hardTiers }));
  const candidateEasy = summarize(filterRecords(candidateRecords, { tiers: policy.easyTiers }));
  const candidateHard = summarize(filterRecords(candidateRecords, { tiers: policy.hardTiers }));
  const baselineAll = summarize(baselineRecords);
  const candidateAll = summarize(candidateRecords);

  const hardTierSuccessLift = relativeChange(candidateHard.successRate, baselineHard.successRate);
  const hardTierQualityGain = candidateHard.successRate - baselineHard.successRate;
  const easyTierRuntimeRegression = relativeChange(candidateEasy.medianRuntime, baselineEasy.medianRuntime);
  const maintainabilityDelta = candidateAll.avgMaintainability - baselineAll.avgMaintainability;
  const testQualityDelta = candidateAll.avgTestQuality - baselineAll.avgTestQuality;
  const costRegression = relativeChange(candidateAll.medianCost, baselineAll.medianCost);
  const ratio = qualityCostRatio(hardTierQualityGain, costRegression);

  const gates: GateFlags = {
    success: hardTierSuccessLift >= thresholds.minSuccessLift,
    runtime: easyTierRuntimeRegression <= thresholds.maxRuntimeRegression,
    quality: maintainabilityDelta >= thresholds.qualityTolerance && testQualityDelta >= thresholds.qualityTolerance,
    cost: costRegression <= thresholds.maxCostRegression || ratio >= thresholds.minQualityCostRatio,
  };

  // Only regressions are penalised; improvements earn nothing beyond the gain term
  const frontierScore =
    hardTierQualityGain -
    thresholds.costPenaltyWeight * Math.max(costRegression, 0) -
    thresholds.runtimePenaltyWeight * Math.max(easyTierRuntimeRegression, 0);

  return {
    condition,
    baselineHardTierSuccessRate: baselineHard.successRate,
    hardTierSuccessRate: candidateHard.successRate,
    hardTierSuccessLift,
    hardTierQualityGain,
    easyTierRuntimeRegression,
    maintainabilityDelta,
    testQualityDelta,
    costRegression,
    qualityCostRatio: ratio,
    gates,
    gateCount: countGates(gates),
    frontierScore,
  };
}
