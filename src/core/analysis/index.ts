/**
 * Barrel exports for the analysis module.
 */
export { filterRecords, summarize, summarizeByCondition } from './aggregate.js';
export { relativeChange, qualityCostRatio, countGates, evaluateCondition } from './gates.js';
export { evaluateAdoption, compareEvaluations, decisionToJson } from './ranker.js';
export { DEFAULT_GATE_POLICY, DEFAULT_GATE_THRESHOLDS } from './policy.js';
export type {
  AnalysisRecord,
  RecordFilter,
  ConditionSummary,
  ConditionSummaryRow,
  GateThresholds,
  GatePolicy,
  GateFlags,
  GateEvaluation,
  AdoptionDecision,
} from './types.js';
