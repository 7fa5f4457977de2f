/**
 * Trial result files: TrialRow -> CSV on write, CSV -> AnalysisRecord on read.
 */
import { formatCsv, parseCsv, type CsvCell } from '../../utils/csv.js';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import { readFile } from '../../utils/file-system.js';
import type { AnalysisRecord } from '../analysis/types.js';
import type { TrialRow } from '../harness/types.js';
import { FLOAT_FIELDS, INT_FIELDS, TRIAL_CSV_FIELDS, type TrialCsvField } from './columns.js';

type IntField = (typeof INT_FIELDS)[number];
type FloatField = (typeof FLOAT_FIELDS)[number];

/**
 * Flatten a trial into its CSV cells. Flags are written as 0/1.
 */
export function trialRowToCells(row: TrialRow): Record<TrialCsvField, CsvCell> {
  const { outcome } = row;
  return {
    schema_version: row.schemaVersion,
    experiment_id: row.experimentId,
    run_id: row.runId,
    timestamp_utc: row.timestampUtc,
    mode: row.mode,
    seed: row.seed,
    trial_id: row.trialId,
    task_id: row.taskId,
    task_title: row.taskTitle,
    task_tier: row.taskTier,
    repo_type: row.repoType,
    repo_slug: row.repoSlug,
    repo_locator: row.repoLocator,
    model: row.model,
    condition: row.condition,
    condition_label: row.conditionLabel,
    repeat_index: row.repeatIndex,
    has_context_files: row.hasContextFiles,
    discovery_instruction: row.discoveryInstruction,
    inline_strategy: row.inlineStrategy,
    inline_budget_tokens: row.inlineBudgetTokens,
    context_utilized: outcome.contextUtilized,
    task_success: outcome.taskSuccess,
    tests_passed: outcome.testsPassed,
    status: outcome.status,
    runtime_seconds: outcome.runtimeSeconds,
    input_tokens: outcome.inputTokens,
    output_tokens: outcome.outputTokens,
    total_tokens: outcome.totalTokens,
    estimated_cost_usd: outcome.estimatedCostUsd,
    judge_correctness: outcome.judges.correctness,
    judge_maintainability: outcome.judges.maintainability,
    judge_architectural_fit: outcome.judges.architecturalFit,
    judge_test_quality: outcome.judges.testQuality,
    judge_minimality: outcome.judges.minimality,
    pr_readiness_score: outcome.prReadinessScore,
  };
}

export function formatTrialCsv(rows: readonly TrialRow[]): string {
  return formatCsv(TRIAL_CSV_FIELDS, rows.map(trialRowToCells));
}

/**
 * Convert an in-memory trial to the analysis view without a CSV round trip.
 */
export function toAnalysisRecord(row: TrialRow): AnalysisRecord {
  const { outcome } = row;
  return {
    condition: row.condition,
    tier: row.taskTier,
    taskSuccess: outcome.taskSuccess ? 1 : 0,
    testsPassed: outcome.testsPassed ? 1 : 0,
    contextUtilized: outcome.contextUtilized ? 1 : 0,
    runtimeSeconds: outcome.runtimeSeconds,
    totalTokens: outcome.totalTokens,
    estimatedCostUsd: outcome.estimatedCostUsd,
    prReadinessScore: outcome.prReadinessScore,
    judgeMaintainability: outcome.judges.maintainability,
    judgeTestQuality: outcome.judges.testQuality,
  };
}

function coerce(
  row: Record<string, string>,
  field: IntField | FloatField,
  integer: boolean,
  line: number,
  source: string
): number {
  const raw = row[field]?.trim() ?? '';
  if (raw === '') return 0;
  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new ValidationError(
      ErrorCodes.INVALID_CSV,
      `${source}:${line}: column ${field} expects ${integer ? 'an integer' : 'a number'}, got "${raw}"`,
      { source, line, field, value: raw }
    );
  }
  return value;
}

/**
 * Parse a trial CSV into analysis records.
 *
 * Only `condition` and `task_tier` are required columns; numeric columns
 * that are absent or empty read as 0.
 */
export function parseAnalysisRecords(content: string, source = 'input'): AnalysisRecord[] {
  const table = parseCsv(content);
  for (const required of ['condition', 'task_tier']) {
    if (table.header.length > 0 && !table.header.includes(required)) {
      throw new ValidationError(ErrorCodes.INVALID_CSV, `${source}: missing required column ${required}`, {
        source,
        column: required,
      });
    }
  }
  if (table.rows.length === 0) {
    throw new ValidationError(ErrorCodes.INVALID_CSV, `No rows loaded from ${source}`, { source });
  }

  return table.rows.map((row, index) => {
    const line = table.lines[index];
    const int = (field: IntField): number => coerce(row, field, true, line, source);
    const float = (field: FloatField): number => coerce(row, field, false, line, source);
    return {
      condition: row.condition ?? '',
      tier: row.task_tier ?? '',
      taskSuccess: int('task_success'),
      testsPassed: int('tests_passed'),
      contextUtilized: int('context_utilized'),
      totalTokens: int('total_tokens'),
      runtimeSeconds: float('runtime_seconds'),
      estimatedCostUsd: float('estimated_cost_usd'),
      prReadinessScore: float('pr_readiness_score'),
      judgeMaintainability: float('judge_maintainability'),
      judgeTestQuality: float('judge_test_quality'),
    };
  });
}

export async function loadAnalysisRecords(filePath: string): Promise<AnalysisRecord[]> {
  return parseAnalysisRecords(await readFile(filePath), filePath);
}
