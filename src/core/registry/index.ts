/**
 * Experiment registry: immutable lookup tables built once and passed
 * explicitly to the simulator and run driver.
 */
import { CONDITION_CONFIGS } from './conditions.js';
import { MODEL_PROFILES } from './models.js';
import { SIMULATION_TABLES } from './tables.js';
import { BASELINE_CONDITION, type ConditionId, type ConditionConfig, type ExperimentRegistry, type ModelProfile } from './types.js';

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Build the registry. Condition and model entries are frozen; the maps
 * preserve declaration order, which is also the default run order.
 */
export function createRegistry(): ExperimentRegistry {
  const conditions = new Map<ConditionId, ConditionConfig>(
    CONDITION_CONFIGS.map((config) => [config.condition, deepFreeze({ ...config })])
  );
  const models = new Map<string, ModelProfile>(
    MODEL_PROFILES.map((profile) => [profile.model, deepFreeze({ ...profile })])
  );
  return Object.freeze({
    conditions,
    models,
    tables: deepFreeze(SIMULATION_TABLES),
    baseline: BASELINE_CONDITION,
  });
}

export { CONDITION_CONFIGS } from './conditions.js';
export { MODEL_PROFILES } from './models.js';
export { SIMULATION_TABLES } from './tables.js';
export * from './types.js';
