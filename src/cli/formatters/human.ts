/**
 * Human-readable analysis output.
 */
import chalk from 'chalk';
import { formatCurrency, formatPercent, formatRatio, formatSigned } from '../../utils/format.js';
import type { GateEvaluation } from '../../core/analysis/types.js';
import type { AnalysisReport, FormatOptions, IFormatter } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'dim' | 'bold';

const RULE = '────────────────────────────────────────';

export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatAnalysis(report: AnalysisReport): string {
    const { decision, policy } = report;
    const lines: string[] = [];

    lines.push(this.colorize(`Analyzed ${report.rowCount} rows from ${report.inputPath}`, 'dim'));
    lines.push('');
    lines.push(this.colorize('Condition Summary', 'bold'));
    lines.push(this.colorize(RULE, 'dim'));
    lines.push(`  ${'COND'.padEnd(6)}${'N'.padStart(6)}${'SUCCESS'.padStart(10)}${'READY'.padStart(8)}${'RUNTIME'.padStart(10)}${'COST'.padStart(10)}`);
    for (const s of report.summaries) {
      lines.push(
        `  ${s.condition.padEnd(6)}${String(s.n).padStart(6)}${formatPercent(s.successRate).padStart(10)}` +
          `${s.avgPrReadiness.toFixed(3).padStart(8)}${s.medianRuntime.toFixed(1).padStart(10)}` +
          `${formatCurrency(s.medianCost).padStart(10)}`
      );
    }

    lines.push('');
    lines.push(this.colorize(`Candidates vs ${policy.baseline}`, 'bold'));
    lines.push(this.colorize(RULE, 'dim'));
    decision.candidates.forEach((candidate, index) => {
      lines.push(...this.formatCandidate(candidate, index + 1));
    });

    lines.push('');
    lines.push(`Recommended condition: ${this.colorize(decision.recommendedCondition, 'cyan')}`);
    lines.push(
      `Adoption status: ${decision.adopt ? this.colorize('adopt', 'green') : this.colorize('not ready', 'yellow')}`
    );
    return lines.join('\n');
  }

  private formatCandidate(candidate: GateEvaluation, rank: number): string[] {
    const { gates } = candidate;
    const marks = [
      this.gateMark('success', gates.success),
      this.gateMark('runtime', gates.runtime),
      this.gateMark('quality', gates.quality),
      this.gateMark('cost', gates.cost),
    ].join(' ');
    const lines = [
      `  ${rank}. ${candidate.condition}  ${candidate.gateCount}/4  frontier ${formatSigned(candidate.frontierScore)}  ${marks}`,
    ];
    if (this.options.verbose) {
      lines.push(
        this.colorize(
          `     lift ${formatPercent(candidate.hardTierSuccessLift)}, runtime ${formatPercent(candidate.easyTierRuntimeRegression)}, ` +
            `cost ${formatPercent(candidate.costRegression)}, quality/cost ${formatRatio(candidate.qualityCostRatio)}, ` +
            `maint ${formatSigned(candidate.maintainabilityDelta)}, tests ${formatSigned(candidate.testQualityDelta)}`,
          'dim'
        )
      );
    }
    return lines;
  }

  private gateMark(name: string, passed: boolean): string {
    return passed ? this.colorize(`✓${name}`, 'green') : this.colorize(`✗${name}`, 'red');
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }
    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
