/**
 * Schema for `.ablate/config.yaml`. Every field is optional; zod fills defaults.
 */
import { z } from 'zod';
import { DEFAULT_REPEATS, DEFAULT_SEED } from '../harness/types.js';
import { CONDITION_ORDER, TIER_ORDER } from '../registry/types.js';

/**
 * Make an object field optional and apply the inner schema's defaults when
 * it is missing. Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** A list knob: comma string or YAML list. */
const ListKnobSchema = z.union([z.string(), z.array(z.string())]);

export const RunSettingsSchema = z.object({
  task_suite: z.string().default('tasks/task_suite_v1.json'),
  data_dir: z.string().default('data'),
  latest: z.string().default('data/runs_latest.csv'),
  conditions: ListKnobSchema.optional(),
  models: ListKnobSchema.optional(),
  tiers: ListKnobSchema.optional(),
  repo_types: ListKnobSchema.optional(),
  repeats: z.number().int().min(1).default(DEFAULT_REPEATS),
  seed: z.number().int().default(DEFAULT_SEED),
  max_tasks: z.number().int().min(0).default(0),
});

export const GateThresholdsSchema = z.object({
  min_success_lift: z.number().default(0.1),
  max_runtime_regression: z.number().default(0.15),
  quality_tolerance: z.number().default(-0.02),
  max_cost_regression: z.number().default(0.25),
  min_quality_cost_ratio: z.number().default(0.25),
  cost_penalty_weight: z.number().min(0).default(0.3),
  runtime_penalty_weight: z.number().min(0).default(0.2),
});

export const AnalysisSettingsSchema = z.object({
  input: z.string().default('data/runs_latest.csv'),
  report_dir: z.string().default('report'),
  summary_csv: z.string().optional(),
  baseline: z.enum(CONDITION_ORDER).default('C0'),
  candidates: z.array(z.enum(CONDITION_ORDER)).min(1).default(['C2', 'C3', 'C4']),
  easy_tiers: z.array(z.enum(TIER_ORDER)).min(1).default(['T1']),
  hard_tiers: z.array(z.enum(TIER_ORDER)).min(1).default(['T2', 'T3']),
  gates: withDefaults(GateThresholdsSchema),
});

export const ConfigSchema = z.object({
  run: withDefaults(RunSettingsSchema),
  analysis: withDefaults(AnalysisSettingsSchema),
});

export type RunSettings = z.infer<typeof RunSettingsSchema>;
export type AnalysisSettings = z.infer<typeof AnalysisSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
