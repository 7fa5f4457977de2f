/**
 * Fixed column set of trial result files, in write order.
 */
export const TRIAL_CSV_FIELDS = [
  'schema_version',
  'experiment_id',
  'run_id',
  'timestamp_utc',
  'mode',
  'seed',
  'trial_id',
  'task_id',
  'task_title',
  'task_tier',
  'repo_type',
  'repo_slug',
  'repo_locator',
  'model',
  'condition',
  'condition_label',
  'repeat_index',
  'has_context_files',
  'discovery_instruction',
  'inline_strategy',
  'inline_budget_tokens',
  'context_utilized',
  'task_success',
  'tests_passed',
  'status',
  'runtime_seconds',
  'input_tokens',
  'output_tokens',
  'total_tokens',
  'estimated_cost_usd',
  'judge_correctness',
  'judge_maintainability',
  'judge_architectural_fit',
  'judge_test_quality',
  'judge_minimality',
  'pr_readiness_score',
] as const;

export type TrialCsvField = (typeof TRIAL_CSV_FIELDS)[number];

/** Columns the analysis reads as integers */
export const INT_FIELDS = ['task_success', 'tests_passed', 'context_utilized', 'total_tokens'] as const;

/** Columns the analysis reads as floats */
export const FLOAT_FIELDS = [
  'runtime_seconds',
  'estimated_cost_usd',
  'pr_readiness_score',
  'judge_maintainability',
  'judge_test_quality',
] as const;
