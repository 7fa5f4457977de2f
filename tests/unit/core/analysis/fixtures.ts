/**
 * Record builders shared by the analysis tests.
 */
import type { AnalysisRecord } from '../../../../src/core/analysis/index.js';

export interface ConditionShape {
  /** Successes out of 10 per tier */
  t1: number;
  t2: number;
  t3: number;
  t1Runtime: number;
  cost: number;
  maintainability: number;
  testQuality: number;
}

export function record(overrides: Partial<AnalysisRecord> = {}): AnalysisRecord {
  return {
    condition: 'C0',
    tier: 'T1',
    taskSuccess: 1,
    testsPassed: 1,
    contextUtilized: 0,
    runtimeSeconds: 100,
    totalTokens: 10000,
    estimatedCostUsd: 1,
    prReadinessScore: 0.7,
    judgeMaintainability: 0.7,
    judgeTestQuality: 0.7,
    ...overrides,
  };
}

/**
 * Ten records per tier; hard tiers run 2x and 3x the T1 runtime.
 */
export function conditionRecords(condition: string, shape: ConditionShape): AnalysisRecord[] {
  const tiers: Array<[string, number, number]> = [
    ['T1', shape.t1, shape.t1Runtime],
    ['T2', shape.t2, shape.t1Runtime * 2],
    ['T3', shape.t3, shape.t1Runtime * 3],
  ];
  const records: AnalysisRecord[] = [];
  for (const [tier, successes, runtime] of tiers) {
    for (let index = 0; index < 10; index++) {
      const success = index < successes ? 1 : 0;
      records.push(
        record({
          condition,
          tier,
          taskSuccess: success,
          testsPassed: success,
          contextUtilized: condition === 'C0' ? 0 : 1,
          runtimeSeconds: runtime,
          estimatedCostUsd: shape.cost,
          prReadinessScore: success ? 0.8 : 0.4,
          judgeMaintainability: shape.maintainability,
          judgeTestQuality: shape.testQuality,
        })
      );
    }
  }
  return records;
}

export const BASELINE_SHAPE: ConditionShape = {
  t1: 8,
  t2: 5,
  t3: 4,
  t1Runtime: 100,
  cost: 1,
  maintainability: 0.7,
  testQuality: 0.7,
};

/**
 * C4 passes every gate with the best frontier score, C2 passes every gate
 * with a smaller gain, C3 has the largest gain but fails the runtime gate.
 */
export function acceptedScenario(): AnalysisRecord[] {
  return [
    ...conditionRecords('C0', BASELINE_SHAPE),
    ...conditionRecords('C2', { t1: 8, t2: 6, t3: 5, t1Runtime: 110, cost: 1.1, maintainability: 0.71, testQuality: 0.71 }),
    ...conditionRecords('C3', { t1: 8, t2: 8, t3: 7, t1Runtime: 140, cost: 1.4, maintainability: 0.69, testQuality: 0.69 }),
    ...conditionRecords('C4', { t1: 8, t2: 7, t3: 7, t1Runtime: 112, cost: 1.2, maintainability: 0.72, testQuality: 0.72 }),
  ];
}

/**
 * Every candidate is slower, pricier and worse than the baseline.
 */
export function rejectedScenario(): AnalysisRecord[] {
  const worse: ConditionShape = { ...BASELINE_SHAPE, t1Runtime: 125, cost: 1.5, maintainability: 0.65, testQuality: 0.65 };
  return [
    ...conditionRecords('C0', BASELINE_SHAPE),
    ...conditionRecords('C2', worse),
    ...conditionRecords('C3', worse),
    ...conditionRecords('C4', worse),
  ];
}
