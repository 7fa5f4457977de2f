/**
 * Default gate policy: C2-C4 against C0, easy tier T1, hard tiers T2+T3.
 */
import type { GatePolicy, GateThresholds } from './types.js';

export const DEFAULT_GATE_THRESHOLDS: Readonly<GateThresholds> = Object.freeze({
  minSuccessLift: 0.1,
  maxRuntimeRegression: 0.15,
  qualityTolerance: -0.02,
  maxCostRegression: 0.25,
  minQualityCostRatio: 0.25,
  costPenaltyWeight: 0.3,
  runtimePenaltyWeight: 0.2,
});

export const DEFAULT_GATE_POLICY: Readonly<GatePolicy> = Object.freeze({
  baseline: 'C0',
  candidates: Object.freeze(['C2', 'C3', 'C4']),
  easyTiers: Object.freeze(['T1']),
  hardTiers: Object.freeze(['T2', 'T3']),
  thresholds: DEFAULT_GATE_THRESHOLDS,
});
