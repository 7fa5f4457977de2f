/**
 * Formatter type definitions.
 */
import type { AdoptionDecision, ConditionSummaryRow, GatePolicy } from '../../core/analysis/types.js';

export type OutputFormat = 'human' | 'json';

export interface FormatOptions {
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Show every gate metric, not just the ranked table */
  verbose: boolean;
}

/**
 * What an analysis run prints.
 */
export interface AnalysisReport {
  inputPath: string;
  rowCount: number;
  summaries: ConditionSummaryRow[];
  decision: AdoptionDecision;
  policy: GatePolicy;
}

export interface IFormatter {
  formatAnalysis(report: AnalysisReport): string;
}
