/**
 * Markdown rendering of condition summaries and adoption decisions.
 */
import { formatCurrency, formatPercent, formatSigned } from '../../utils/format.js';
import type { AdoptionDecision, ConditionSummaryRow, GateEvaluation, GatePolicy } from '../analysis/types.js';

export interface ReportContext {
  /** Where the trial rows came from */
  inputPath: string;
  rowCount: number;
  generatedAt: Date;
  policy: GatePolicy;
}

function tierLabel(tiers: readonly string[]): string {
  return tiers.join('+');
}

/** "2026-02-20 09:15:00 UTC" */
export function formatGeneratedAt(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function adoptionText(decision: AdoptionDecision): string {
  return decision.adopt ? 'Adopt' : 'Do not adopt yet';
}

export function renderConditionTable(summaries: readonly ConditionSummaryRow[]): string {
  const lines = [
    '| Condition | N | Success | Tests Pass | PR Readiness | Median Runtime (s) | Median Tokens | Median Cost | Context Utilization |',
    '|---|---:|---:|---:|---:|---:|---:|---:|---:|',
  ];
  for (const s of summaries) {
    lines.push(
      `| ${s.condition} | ${s.n.toFixed(0)} | ${formatPercent(s.successRate)} | ${formatPercent(s.testsPassRate)} ` +
        `| ${s.avgPrReadiness.toFixed(3)} | ${s.medianRuntime.toFixed(1)} | ${s.medianTokens.toFixed(0)} ` +
        `| ${formatCurrency(s.medianCost)} | ${formatPercent(s.contextUtilizationRate)} |`
    );
  }
  return lines.join('\n');
}

export function renderCandidateTable(candidates: readonly GateEvaluation[], policy: GatePolicy): string {
  const hard = tierLabel(policy.hardTiers);
  const easy = tierLabel(policy.easyTiers);
  const lines = [
    `| Condition | ${hard} Success | Relative Lift vs ${policy.baseline} | ${easy} Runtime Regression | Maintainability Delta | Test Quality Delta | Cost Regression | Gates Passed |`,
    '|---|---:|---:|---:|---:|---:|---:|---:|',
  ];
  for (const c of candidates) {
    lines.push(
      `| ${c.condition} | ${formatPercent(c.hardTierSuccessRate)} | ${formatPercent(c.hardTierSuccessLift)} ` +
        `| ${formatPercent(c.easyTierRuntimeRegression)} | ${formatSigned(c.maintainabilityDelta)} ` +
        `| ${formatSigned(c.testQualityDelta)} | ${formatPercent(c.costRegression)} | ${c.gateCount}/4 |`
    );
  }
  return lines.join('\n');
}

export function renderFindings(
  summaries: readonly ConditionSummaryRow[],
  decision: AdoptionDecision,
  context: ReportContext
): string {
  const { policy } = context;
  const { recommended, recommendedCondition } = decision;
  const { thresholds } = policy;
  const hard = tierLabel(policy.hardTiers);
  const easy = tierLabel(policy.easyTiers);
  const candidates = policy.candidates.map((c) => `\`${c}\``).join(', ');

  return [
    '# Findings',
    '',
    `Generated: ${formatGeneratedAt(context.generatedAt)}`,
    '',
    `Input run file: \`${context.inputPath}\``,
    '',
    `Total rows: ${context.rowCount}`,
    '',
    '## Condition Summary',
    '',
    renderConditionTable(summaries),
    '',
    `## Gate Evaluation (${candidates} vs \`${policy.baseline}\`)`,
    '',
    renderCandidateTable(decision.candidates, policy),
    '',
    '## Decision',
    '',
    `- Recommended condition: \`${recommendedCondition}\``,
    `- Adoption status: **${adoptionText(decision)}**`,
    `- Gate results for \`${recommendedCondition}\`:`,
    `  - success lift on \`${hard}\` >= ${formatPercent(thresholds.minSuccessLift)}: \`${recommended.gates.success}\``,
    `  - \`${easy}\` runtime regression <= ${formatPercent(thresholds.maxRuntimeRegression)}: \`${recommended.gates.runtime}\``,
    `  - maintainability/test-quality non-regression: \`${recommended.gates.quality}\``,
    `  - cost increase justified by quality lift: \`${recommended.gates.cost}\``,
    '',
  ].join('\n');
}

export function renderExecutiveSummary(decision: AdoptionDecision, policy: GatePolicy): string {
  const { recommended } = decision;
  return [
    '# Executive Summary',
    '',
    `Recommended default context condition: \`${decision.recommendedCondition}\`.`,
    '',
    `Adoption decision: **${adoptionText(decision)}**.`,
    '',
    '- Reasoning:',
    `  - Relative \`${tierLabel(policy.hardTiers)}\` success lift: ${formatPercent(recommended.hardTierSuccessLift)}`,
    `  - \`${tierLabel(policy.easyTiers)}\` runtime regression: ${formatPercent(recommended.easyTierRuntimeRegression)}`,
    `  - Cost regression: ${formatPercent(recommended.costRegression)}`,
    `  - Maintainability delta: ${formatSigned(recommended.maintainabilityDelta)}`,
    `  - Test quality delta: ${formatSigned(recommended.testQualityDelta)}`,
    '',
  ].join('\n');
}

export function renderDataCard(context: ReportContext): string {
  return [
    '# Data Card',
    '',
    '- Dataset: `context_ablation_run_v1`',
    `- Source: \`${context.inputPath}\``,
    `- Rows: ${context.rowCount}`,
    '- Unit: one row per (task, condition, model, repeat)',
    '- Core fields: `condition`, `task_tier`, `repo_type`, `model`, `task_success`, ' +
      '`pr_readiness_score`, `runtime_seconds`, `total_tokens`, `estimated_cost_usd`',
    '- Limitations: outcomes are simulated from fixed effect tables; no agent was executed.',
    '',
  ].join('\n');
}

export const CHARTS_README = [
  '# Charts',
  '',
  'This directory stores chart-ready CSV summaries.',
  '',
  '- `condition_summary_latest.csv`: latest condition-level aggregate table.',
  '',
].join('\n');
