/**
 * Types for the experiment registry: conditions, model profiles and the
 * tier/archetype base-rate tables the simulator reads.
 */

/** Task difficulty buckets, easiest first. */
export const TIER_ORDER = ['T1', 'T2', 'T3'] as const;
export type Tier = (typeof TIER_ORDER)[number];

/** Repository archetypes. */
export const REPO_TYPE_ORDER = ['library_cli', 'service_backend', 'fullstack_app', 'monorepo'] as const;
export type RepoType = (typeof REPO_TYPE_ORDER)[number];

/** Context conditions; C0 is the baseline. */
export const CONDITION_ORDER = ['C0', 'C1', 'C2', 'C3', 'C4'] as const;
export type ConditionId = (typeof CONDITION_ORDER)[number];

export const BASELINE_CONDITION: ConditionId = 'C0';

export type InlineStrategy = 'none' | 'full_root' | 'summary_plus_retrieval';

/**
 * How auxiliary context is exposed to the agent, and the effect sizes the
 * simulator applies for it.
 */
export interface ConditionConfig {
  readonly condition: ConditionId;
  readonly label: string;
  /** Context files exist in the repository */
  readonly hasContextFiles: boolean;
  /** The prompt tells the agent to look for them */
  readonly discoveryInstruction: boolean;
  readonly inlineStrategy: InlineStrategy;
  readonly inlineBudgetTokens: number;
  readonly successDelta: number;
  readonly readinessDelta: number;
  readonly runtimeDelta: number;
  readonly tokenDelta: number;
  readonly utilizationBoost: number;
}

export interface ModelProfile {
  readonly model: string;
  readonly successBias: number;
  readonly readinessBias: number;
  readonly tokenMultiplier: number;
  /** Output tokens per input token */
  readonly outputRatio: number;
  readonly inputCostPer1k: number;
  readonly outputCostPer1k: number;
  /** Added to the context-utilisation probability */
  readonly utilizationBonus: number;
}

export type TierTable = Readonly<Record<Tier, number>>;
export type RepoTypeTable = Readonly<Record<RepoType, number>>;
/** Sparse condition x tier overrides; absent entries fall back to a neutral value. */
export type ConditionTierTable = Readonly<Partial<Record<ConditionId, Readonly<Partial<Record<Tier, number>>>>>>;

export interface SimulationTables {
  readonly tierSuccessBase: TierTable;
  readonly repoSuccessDelta: RepoTypeTable;
  readonly tierRuntimeBase: TierTable;
  readonly repoRuntimeMultiplier: RepoTypeTable;
  readonly tierInputTokenBase: TierTable;
  readonly repoTokenMultiplier: RepoTypeTable;
  readonly tierContextBase: TierTable;
  /** Additive success bonus (neutral 0) */
  readonly conditionTierSuccessBonus: ConditionTierTable;
  /** Runtime multiplier (neutral 1) */
  readonly conditionTierRuntimeSurcharge: ConditionTierTable;
  /** Subtracted from the minimality judge (neutral 0) */
  readonly conditionTierMinimalityPenalty: ConditionTierTable;
  /** Tiers on which context utilisation does not slow the run down */
  readonly utilizationRuntimeExemptTiers: readonly Tier[];
}

/**
 * Everything the simulator and run driver look up, built once per process.
 */
export interface ExperimentRegistry {
  readonly conditions: ReadonlyMap<ConditionId, ConditionConfig>;
  readonly models: ReadonlyMap<string, ModelProfile>;
  readonly tables: SimulationTables;
  readonly baseline: ConditionId;
}

export function isTier(value: unknown): value is Tier {
  return typeof value === 'string' && (TIER_ORDER as readonly string[]).includes(value);
}

export function isRepoType(value: unknown): value is RepoType {
  return typeof value === 'string' && (REPO_TYPE_ORDER as readonly string[]).includes(value);
}

export function isConditionId(value: unknown): value is ConditionId {
  return typeof value === 'string' && (CONDITION_ORDER as readonly string[]).includes(value);
}
