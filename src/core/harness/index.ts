export { resolveRunPlan, parseListOption } from './plan.js';
export { runExperiment, formatRunTimestamp, overallSuccessRate } from './runner.js';
export type { RunOptions } from './runner.js';
export { EXPERIMENT_ID, SCHEMA_VERSION, DEFAULT_SEED, DEFAULT_REPEATS, RUN_MODES } from './types.js';
export type { RunMode, RunPlan, RunPlanInput, TrialRow, ExperimentRun } from './types.js';
