/**
 * Run-plan validation. Every knob is checked against its allow-list
 * before any trial is simulated.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { CONDITION_ORDER, REPO_TYPE_ORDER, TIER_ORDER, type ExperimentRegistry } from '../registry/types.js';
import { DEFAULT_REPEATS, DEFAULT_SEED, type RunPlan, type RunPlanInput } from './types.js';

function isOneOf<T extends string>(allowed: readonly T[], value: string): value is T {
  return (allowed as readonly string[]).includes(value);
}

/**
 * Split a comma list (or take an array), trim, drop blanks, and reject
 * values outside `allowed`. The error names the offending values and the allowed set.
 */
export function parseListOption<T extends string>(
  raw: string | readonly string[],
  allowed: readonly T[],
  fieldName: string
): T[] {
  const items = (typeof raw === 'string' ? raw.split(',') : raw).map((item) => item.trim()).filter(Boolean);
  if (items.length === 0) {
    throw new ConfigError(ErrorCodes.UNKNOWN_VALUE, `${fieldName} must include at least one value.`, { field: fieldName });
  }
  const invalid = items.filter((item) => !isOneOf(allowed, item));
  if (invalid.length > 0) {
    const sortedAllowed = [...allowed].sort();
    throw new ConfigError(
      ErrorCodes.UNKNOWN_VALUE,
      `${fieldName} includes unsupported values: ${invalid.join(', ')}; allowed=${sortedAllowed.join(', ')}`,
      { field: fieldName, invalid, allowed: sortedAllowed }
    );
  }
  return items.filter((item): item is T => isOneOf(allowed, item));
}

/**
 * Validate raw knobs into a RunPlan.
 */
export function resolveRunPlan(input: RunPlanInput, registry: ExperimentRegistry): RunPlan {
  const mode = input.mode ?? 'simulate';
  if (mode === 'live') {
    throw new ConfigError(
      ErrorCodes.UNSUPPORTED_MODE,
      'Live mode is not wired yet. Use --mode simulate for this track.',
      { mode }
    );
  }
  if (mode !== 'simulate') {
    throw new ConfigError(ErrorCodes.UNKNOWN_VALUE, `--mode must be one of: simulate, live (got ${mode})`, { mode });
  }

  const repeats = input.repeats ?? DEFAULT_REPEATS;
  if (!Number.isInteger(repeats) || repeats <= 0) {
    throw new ConfigError(ErrorCodes.INVALID_REPEATS, `--repeats must be >= 1 (got ${repeats}).`, { repeats });
  }
  const maxTasks = input.maxTasks ?? 0;
  if (!Number.isInteger(maxTasks) || maxTasks < 0) {
    throw new ConfigError(ErrorCodes.INVALID_MAX_TASKS, `--max-tasks must be >= 0 (got ${maxTasks}).`, { maxTasks });
  }
  const seed = input.seed ?? DEFAULT_SEED;
  if (!Number.isSafeInteger(seed)) {
    throw new ConfigError(ErrorCodes.INVALID_SEED, `--seed must be an integer (got ${seed}).`, { seed });
  }

  const registeredConditions = CONDITION_ORDER.filter((id) => registry.conditions.has(id));
  const registeredModels = [...registry.models.keys()];

  return {
    mode: 'simulate',
    conditions: parseListOption(input.conditions ?? registeredConditions, registeredConditions, '--conditions'),
    models: parseListOption(input.models ?? registeredModels, registeredModels, '--models'),
    tiers: new Set(parseListOption(input.tiers ?? TIER_ORDER, TIER_ORDER, '--tiers')),
    repoTypes: new Set(parseListOption(input.repoTypes ?? REPO_TYPE_ORDER, REPO_TYPE_ORDER, '--repo-types')),
    repeats,
    seed,
    maxTasks,
  };
}
