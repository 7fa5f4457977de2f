/**
 * Types for the trial simulator.
 */

export type TrialStatus = 'ok' | 'failed_checks';

/**
 * The five judge sub-scores, each in [0, 1].
 */
export interface JudgeScores {
  correctness: number;
  maintainability: number;
  architecturalFit: number;
  testQuality: number;
  minimality: number;
}

export const JUDGE_KEYS = [
  'correctness',
  'maintainability',
  'architecturalFit',
  'testQuality',
  'minimality',
] as const satisfies ReadonlyArray<keyof JudgeScores>;

/**
 * Outcome of one simulated trial. Never mutated after creation.
 */
export interface OutcomeRecord {
  readonly taskSuccess: boolean;
  /** Precondition for success: false here forces taskSuccess false */
  readonly testsPassed: boolean;
  readonly contextUtilized: boolean;
  readonly status: TrialStatus;
  /** Wall clock, 2 decimals */
  readonly runtimeSeconds: number;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
  /** USD, 4 decimals */
  readonly estimatedCostUsd: number;
  readonly judges: Readonly<JudgeScores>;
  /** Composite of the judges, 4 decimals */
  readonly prReadinessScore: number;
}
