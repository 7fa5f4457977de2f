/**
 * Aggregation over analysis records. Summaries are always recomputed
 * from the records passed in.
 */
import { safeMean, safeMedian } from '../../utils/stats.js';
import { CONDITION_ORDER } from '../registry/types.js';
import type { AnalysisRecord, ConditionSummary, ConditionSummaryRow, RecordFilter } from './types.js';

/**
 * Keep records matching every given predicate. Omitted predicates match everything.
 */
export function filterRecords(records: readonly AnalysisRecord[], filter: RecordFilter = {}): AnalysisRecord[] {
  const { condition, tiers } = filter;
  const tierSet = tiers === undefined ? undefined : new Set(tiers);
  return records.filter(
    (record) =>
      (condition === undefined || record.condition === condition) &&
      (tierSet === undefined || tierSet.has(record.tier))
  );
}

export function summarize(records: readonly AnalysisRecord[]): ConditionSummary {
  const column = (pick: (record: AnalysisRecord) => number): number[] => records.map(pick);
  return {
    n: records.length,
    successRate: safeMean(column((r) => r.taskSuccess)),
    testsPassRate: safeMean(column((r) => r.testsPassed)),
    avgPrReadiness: safeMean(column((r) => r.prReadinessScore)),
    medianRuntime: safeMedian(column((r) => r.runtimeSeconds)),
    medianTokens: safeMedian(column((r) => r.totalTokens)),
    medianCost: safeMedian(column((r) => r.estimatedCostUsd)),
    contextUtilizationRate: safeMean(column((r) => r.contextUtilized)),
    avgMaintainability: safeMean(column((r) => r.judgeMaintainability)),
    avgTestQuality: safeMean(column((r) => r.judgeTestQuality)),
  };
}

/**
 * One summary per condition in `order`, skipping conditions without records.
 */
export function summarizeByCondition(
  records: readonly AnalysisRecord[],
  order: readonly string[] = CONDITION_ORDER
): ConditionSummaryRow[] {
  const rows: ConditionSummaryRow[] = [];
  for (const condition of order) {
    const subset = filterRecords(records, { condition });
    if (subset.length === 0) continue;
    rows.push({ condition, ...summarize(subset) });
  }
  return rows;
}
