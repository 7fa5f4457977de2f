/**
 * JSON output formatter for machine consumption.
 */
import { decisionToJson } from '../../core/analysis/ranker.js';
import type { AnalysisReport, IFormatter } from './types.js';

export class JsonFormatter implements IFormatter {
  formatAnalysis(report: AnalysisReport): string {
    return JSON.stringify(
      {
        input: report.inputPath,
        rows: report.rowCount,
        baseline: report.policy.baseline,
        summaries: report.summaries,
        decision: decisionToJson(report.decision),
      },
      null,
      2
    );
  }
}
