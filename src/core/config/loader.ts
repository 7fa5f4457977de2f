/**
 * Configuration loading and translation into core inputs.
 */
import * as path from 'node:path';
import { ConfigSchema, type AnalysisSettings, type Config, type RunSettings } from './schema.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { GatePolicy } from '../analysis/types.js';
import type { RunPlanInput } from '../harness/types.js';

const DEFAULT_CONFIG_PATH = '.ablate/config.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the default file doesn't exist; an explicitly
 * given path must exist.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Config file not found: ${fullPath}`, { path: fullPath });
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}

/**
 * Run knobs from the config file, before CLI overrides.
 */
export function toRunPlanInput(run: RunSettings): RunPlanInput {
  return {
    conditions: run.conditions,
    models: run.models,
    tiers: run.tiers,
    repoTypes: run.repo_types,
    repeats: run.repeats,
    seed: run.seed,
    maxTasks: run.max_tasks,
  };
}

export function toGatePolicy(analysis: AnalysisSettings): GatePolicy {
  const { gates } = analysis;
  return {
    baseline: analysis.baseline,
    candidates: analysis.candidates,
    easyTiers: analysis.easy_tiers,
    hardTiers: analysis.hard_tiers,
    thresholds: {
      minSuccessLift: gates.min_success_lift,
      maxRuntimeRegression: gates.max_runtime_regression,
      qualityTolerance: gates.quality_tolerance,
      maxCostRegression: gates.max_cost_regression,
      minQualityCostRatio: gates.min_quality_cost_ratio,
      costPenaltyWeight: gates.cost_penalty_weight,
      runtimePenaltyWeight: gates.runtime_penalty_weight,
    },
  };
}
