/**
 * Types for the run driver.
 */
import type { ConditionId, InlineStrategy, RepoType, Tier } from '../registry/types.js';
import type { OutcomeRecord } from '../simulate/types.js';

export const EXPERIMENT_ID = 'context-ablation';
export const SCHEMA_VERSION = 'context_ablation_run_v1';
export const DEFAULT_SEED = 20260220;
export const DEFAULT_REPEATS = 5;

export const RUN_MODES = ['simulate', 'live'] as const;
export type RunMode = (typeof RUN_MODES)[number];

/**
 * Raw knobs as they arrive from flags or the config file. List knobs are
 * comma-separated strings or arrays; anything omitted takes the registry's full set.
 */
export interface RunPlanInput {
  mode?: string;
  conditions?: string | readonly string[];
  models?: string | readonly string[];
  tiers?: string | readonly string[];
  repoTypes?: string | readonly string[];
  repeats?: number;
  seed?: number;
  maxTasks?: number;
}

/**
 * A validated run plan. Only simulate mode ever validates.
 */
export interface RunPlan {
  readonly mode: 'simulate';
  readonly conditions: readonly ConditionId[];
  readonly models: readonly string[];
  readonly tiers: ReadonlySet<Tier>;
  readonly repoTypes: ReadonlySet<RepoType>;
  readonly repeats: number;
  readonly seed: number;
  readonly maxTasks: number;
}

/**
 * One trial: run metadata plus the simulated outcome.
 */
export interface TrialRow {
  readonly schemaVersion: string;
  readonly experimentId: string;
  readonly runId: string;
  readonly timestampUtc: string;
  readonly mode: 'simulate';
  readonly seed: number;
  /** 1-based, in generation order */
  readonly trialId: number;
  readonly taskId: string;
  readonly taskTitle: string;
  readonly taskTier: Tier;
  readonly repoType: RepoType;
  readonly repoSlug: string;
  readonly repoLocator: string;
  readonly model: string;
  readonly condition: ConditionId;
  readonly conditionLabel: string;
  /** 1-based */
  readonly repeatIndex: number;
  readonly hasContextFiles: boolean;
  readonly discoveryInstruction: boolean;
  readonly inlineStrategy: InlineStrategy;
  readonly inlineBudgetTokens: number;
  readonly outcome: OutcomeRecord;
}

export interface ExperimentRun {
  readonly runId: string;
  readonly timestampUtc: string;
  readonly plan: RunPlan;
  readonly rows: readonly TrialRow[];
}
