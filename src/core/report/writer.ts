/**
 * Writes report artifacts to disk.
 */
import * as path from 'node:path';
import { formatCsv } from '../../utils/csv.js';
import { writeFile } from '../../utils/file-system.js';
import { decisionToJson } from '../analysis/ranker.js';
import type { AdoptionDecision, ConditionSummaryRow } from '../analysis/types.js';
import {
  CHARTS_README,
  renderDataCard,
  renderExecutiveSummary,
  renderFindings,
  type ReportContext,
} from './markdown.js';

export const SUMMARY_CSV_FIELDS = [
  'condition',
  'n',
  'success_rate',
  'tests_pass_rate',
  'avg_pr_readiness',
  'median_runtime',
  'median_tokens',
  'median_cost',
  'context_utilization_rate',
  'avg_maintainability',
  'avg_test_quality',
] as const;

export function formatConditionSummaryCsv(summaries: readonly ConditionSummaryRow[]): string {
  return formatCsv(
    SUMMARY_CSV_FIELDS,
    summaries.map((s) => ({
      condition: s.condition,
      n: s.n,
      success_rate: s.successRate,
      tests_pass_rate: s.testsPassRate,
      avg_pr_readiness: s.avgPrReadiness,
      median_runtime: s.medianRuntime,
      median_tokens: s.medianTokens,
      median_cost: s.medianCost,
      context_utilization_rate: s.contextUtilizationRate,
      avg_maintainability: s.avgMaintainability,
      avg_test_quality: s.avgTestQuality,
    }))
  );
}

export async function writeConditionSummaryCsv(
  summaries: readonly ConditionSummaryRow[],
  filePath: string
): Promise<void> {
  await writeFile(filePath, formatConditionSummaryCsv(summaries));
}

/**
 * Write the Markdown reports and decision.json. Returns the paths written.
 */
export async function writeReports(
  summaries: readonly ConditionSummaryRow[],
  decision: AdoptionDecision,
  context: ReportContext,
  reportDir: string
): Promise<string[]> {
  const files: Array<[string, string]> = [
    ['findings.md', renderFindings(summaries, decision, context)],
    ['executive_summary.md', renderExecutiveSummary(decision, context.policy)],
    ['data_card.md', renderDataCard(context)],
    ['decision.json', `${JSON.stringify(decisionToJson(decision), null, 2)}\n`],
    [path.join('charts', 'README.md'), CHARTS_README],
  ];
  const written: string[] = [];
  for (const [name, content] of files) {
    const target = path.join(reportDir, name);
    await writeFile(target, content);
    written.push(target);
  }
  return written;
}
