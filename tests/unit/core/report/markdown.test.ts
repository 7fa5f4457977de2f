/**
 * Tests for Markdown report rendering.
 */
import { describe, it, expect } from 'vitest';
import {
  adoptionText,
  formatGeneratedAt,
  renderCandidateTable,
  renderConditionTable,
  renderDataCard,
  renderExecutiveSummary,
  renderFindings,
  type ReportContext,
} from '../../../../src/core/report/index.js';
import {
  DEFAULT_GATE_POLICY,
  evaluateAdoption,
  summarizeByCondition,
  type ConditionSummaryRow,
} from '../../../../src/core/analysis/index.js';
import { acceptedScenario, rejectedScenario } from '../analysis/fixtures.js';

const context: ReportContext = {
  inputPath: 'data/runs_latest.csv',
  rowCount: 120,
  generatedAt: new Date(Date.UTC(2026, 1, 20, 9, 15, 0)),
  policy: DEFAULT_GATE_POLICY,
};

const summaryRow: ConditionSummaryRow = {
  condition: 'C0',
  n: 30,
  successRate: 0.5,
  testsPassRate: 0.6,
  avgPrReadiness: 0.6125,
  medianRuntime: 812.25,
  medianTokens: 12000,
  medianCost: 0.0421,
  contextUtilizationRate: 0,
  avgMaintainability: 0.7,
  avgTestQuality: 0.7,
};

describe('formatGeneratedAt', () => {
  it('should print UTC without milliseconds', () => {
    expect(formatGeneratedAt(context.generatedAt)).toBe('2026-02-20 09:15:00 UTC');
  });
});

describe('renderConditionTable', () => {
  it('should render one row per condition', () => {
    const lines = renderConditionTable([summaryRow]).split('\n');

    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('| C0 | 30 | 50.0% | 60.0% | 0.613 | 812.3 | 12000 | $0.0421 | 0.0% |');
  });
});

describe('renderCandidateTable', () => {
  it('should name the policy tiers and baseline in the header', () => {
    const decision = evaluateAdoption(acceptedScenario());
    const [header, , first] = renderCandidateTable(decision.candidates, DEFAULT_GATE_POLICY).split('\n');

    expect(header).toBe(
      '| Condition | T2+T3 Success | Relative Lift vs C0 | T1 Runtime Regression | Maintainability Delta | Test Quality Delta | Cost Regression | Gates Passed |'
    );
    expect(first).toBe('| C4 | 70.0% | 55.6% | 12.0% | +0.020 | +0.020 | 20.0% | 4/4 |');
  });
});

describe('renderFindings', () => {
  it('should report the decision and gate results', () => {
    const records = acceptedScenario();
    const text = renderFindings(summarizeByCondition(records), evaluateAdoption(records), context);
    const lines = text.split('\n');

    expect(lines[0]).toBe('# Findings');
    expect(lines).toContain('Generated: 2026-02-20 09:15:00 UTC');
    expect(lines).toContain('## Gate Evaluation (`C2`, `C3`, `C4` vs `C0`)');
    expect(lines).toContain('- Recommended condition: `C4`');
    expect(lines).toContain('- Adoption status: **Adopt**');
    expect(lines).toContain('  - success lift on `T2+T3` >= 10.0%: `true`');
    expect(lines).toContain('  - `T1` runtime regression <= 15.0%: `true`');
  });
});

describe('renderExecutiveSummary', () => {
  it('should state a negative decision', () => {
    const decision = evaluateAdoption(rejectedScenario());
    const lines = renderExecutiveSummary(decision, DEFAULT_GATE_POLICY).split('\n');

    expect(adoptionText(decision)).toBe('Do not adopt yet');
    expect(lines).toContain('Recommended default context condition: `C2`.');
    expect(lines).toContain('Adoption decision: **Do not adopt yet**.');
    expect(lines).toContain('  - `T1` runtime regression: 25.0%');
    expect(lines).toContain('  - Cost regression: 50.0%');
    expect(lines).toContain('  - Maintainability delta: -0.050');
  });
});

describe('renderDataCard', () => {
  it('should describe the source file and row count', () => {
    const lines = renderDataCard(context).split('\n');

    expect(lines).toContain('- Source: `data/runs_latest.csv`');
    expect(lines).toContain('- Rows: 120');
  });
});
