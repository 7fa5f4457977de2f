/**
 * Adoption ranking over the candidate conditions.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { evaluateCondition } from './gates.js';
import { DEFAULT_GATE_POLICY } from './policy.js';
import type { AdoptionDecision, AnalysisRecord, GateEvaluation, GatePolicy } from './types.js';

/**
 * Descending by gate count, then frontier score, then hard-tier success rate.
 */
export function compareEvaluations(a: GateEvaluation, b: GateEvaluation): number {
  return (
    b.gateCount - a.gateCount ||
    b.frontierScore - a.frontierScore ||
    b.hardTierSuccessRate - a.hardTierSuccessRate
  );
}

/**
 * Evaluate and rank every candidate. The top entry is recommended even with
 * partial gate passage; adoption requires it to pass all four.
 */
export function evaluateAdoption(
  records: readonly AnalysisRecord[],
  policy: GatePolicy = DEFAULT_GATE_POLICY
): AdoptionDecision {
  // Array.prototype.sort is stable, so full ties keep candidate order
  const ranked = policy.candidates
    .map((condition) => evaluateCondition(records, condition, policy))
    .sort(compareEvaluations);

  const recommended = ranked[0];
  if (!recommended) {
    throw new ConfigError(ErrorCodes.NO_CANDIDATES, 'At least one candidate condition is required.', {
      baseline: policy.baseline,
    });
  }
  const { gates } = recommended;

  return {
    recommendedCondition: recommended.condition,
    adopt: gates.success && gates.runtime && gates.quality && gates.cost,
    recommended,
    candidates: ranked,
  };
}

/**
 * JSON-safe copy of a decision. `+Infinity` ratios become the string "Infinity"
 * so no key is dropped or nulled.
 */
export function decisionToJson(decision: AdoptionDecision): Record<string, unknown> {
  const evaluation = (entry: GateEvaluation): Record<string, unknown> => ({
    ...entry,
    gates: { ...entry.gates },
    qualityCostRatio: Number.isFinite(entry.qualityCostRatio) ? entry.qualityCostRatio : String(entry.qualityCostRatio),
  });
  return {
    recommendedCondition: decision.recommendedCondition,
    adopt: decision.adopt,
    recommended: evaluation(decision.recommended),
    candidates: decision.candidates.map(evaluation),
  };
}
