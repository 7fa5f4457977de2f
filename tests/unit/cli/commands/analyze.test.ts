/**
 * Tests for the analyze command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createAnalyzeCommand } from '../../../../src/cli/commands/analyze.js';
import { SUMMARY_CSV_FIELDS } from '../../../../src/core/report/index.js';
import { formatCsv } from '../../../../src/utils/csv.js';
import { logger } from '../../../../src/utils/logger.js';
import { acceptedScenario } from '../../core/analysis/fixtures.js';

// Mock chalk with pass-through
vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    red: (s: string) => s,
    cyan: (s: string) => s,
    dim: (s: string) => s,
  },
}));

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    setLevel: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    debug: vi.fn(),
  },
  resolveLogLevel: vi.fn(() => 'info'),
}));

function scenarioCsv(): string {
  return formatCsv(
    [
      'condition',
      'task_tier',
      'task_success',
      'tests_passed',
      'context_utilized',
      'runtime_seconds',
      'total_tokens',
      'estimated_cost_usd',
      'pr_readiness_score',
      'judge_maintainability',
      'judge_test_quality',
    ],
    acceptedScenario().map((r) => ({
      condition: r.condition,
      task_tier: r.tier,
      task_success: r.taskSuccess,
      tests_passed: r.testsPassed,
      context_utilized: r.contextUtilized,
      runtime_seconds: r.runtimeSeconds,
      total_tokens: r.totalTokens,
      estimated_cost_usd: r.estimatedCostUsd,
      pr_readiness_score: r.prReadinessScore,
      judge_maintainability: r.judgeMaintainability,
      judge_test_quality: r.judgeTestQuality,
    }))
  );
}

function printed(): string {
  return vi
    .mocked(console.log)
    .mock.calls.map((call) => String(call[0]))
    .join('\n');
}

describe('analyze command', () => {
  let tempDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    tempDir = join(tmpdir(), `ablate-analyze-test-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    mkdirSync(join(tempDir, 'data'), { recursive: true });
    writeFileSync(join(tempDir, 'data', 'runs_latest.csv'), scenarioCsv());
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
    vi.spyOn(process, 'exit').mockImplementation((): never => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('createAnalyzeCommand', () => {
    it('creates a command named analyze', () => {
      expect(createAnalyzeCommand().name()).toBe('analyze');
    });

    it('has expected options', () => {
      const optionNames = createAnalyzeCommand().options.map((o) => o.long);
      expect(optionNames).toEqual(['--input', '--report-dir', '--summary-csv', '--config', '--json', '--verbose']);
    });
  });

  describe('runAnalyze', () => {
    it('writes every report artifact under the default report dir', async () => {
      await createAnalyzeCommand().parseAsync(['node', 'test']);

      const reportDir = join(tempDir, 'report');
      for (const name of ['findings.md', 'executive_summary.md', 'data_card.md', 'decision.json']) {
        expect(existsSync(join(reportDir, name))).toBe(true);
      }
      expect(existsSync(join(reportDir, 'charts', 'README.md'))).toBe(true);

      const summary = readFileSync(join(reportDir, 'charts', 'condition_summary_latest.csv'), 'utf-8').trimEnd().split('\n');
      expect(summary[0]).toBe(SUMMARY_CSV_FIELDS.join(','));
      expect(summary.slice(1).map((line) => line.split(',')[0])).toEqual(['C0', 'C2', 'C3', 'C4']);

      const decision = JSON.parse(readFileSync(join(reportDir, 'decision.json'), 'utf-8'));
      expect(decision.recommendedCondition).toBe('C4');
      expect(decision.adopt).toBe(true);
    });

    it('prints the recommendation', async () => {
      await createAnalyzeCommand().parseAsync(['node', 'test']);

      const lines = printed().split('\n');
      expect(lines).toContain(`Analyzed 120 rows from ${join(tempDir, 'data', 'runs_latest.csv')}`);
      expect(lines).toContain('Recommended condition: C4');
      expect(lines).toContain('Adoption status: adopt');
      expect(logger.success).toHaveBeenCalledWith(`Wrote reports to: ${join(tempDir, 'report')}`);
    });

    it('honours --report-dir and --summary-csv', async () => {
      await createAnalyzeCommand().parseAsync(['node', 'test', '--report-dir', 'out', '--summary-csv', 'summary.csv']);

      expect(existsSync(join(tempDir, 'out', 'findings.md'))).toBe(true);
      expect(existsSync(join(tempDir, 'summary.csv'))).toBe(true);
      expect(existsSync(join(tempDir, 'out', 'charts', 'condition_summary_latest.csv'))).toBe(false);
    });

    it('applies candidates from the config file', async () => {
      mkdirSync(join(tempDir, '.ablate'));
      writeFileSync(join(tempDir, '.ablate', 'config.yaml'), 'analysis:\n  candidates: [C3]\n');

      await createAnalyzeCommand().parseAsync(['node', 'test', '--json']);

      const output = JSON.parse(printed());
      expect(output.decision.recommendedCondition).toBe('C3');
      expect(output.decision.adopt).toBe(false);
      expect(output.rows).toBe(120);
    });

    it('reports a missing input file', async () => {
      await expect(createAnalyzeCommand().parseAsync(['node', 'test', '--input', 'missing.csv'])).rejects.toThrow(
        'process.exit called'
      );

      expect(logger.error).toHaveBeenCalledWith(`Input CSV does not exist: ${join(tempDir, 'missing.csv')}`);
      expect(process.exit).toHaveBeenCalledWith(1);
    });

    it('reports a malformed cell with its line', async () => {
      const input = join(tempDir, 'bad.csv');
      writeFileSync(input, 'condition,task_tier,task_success\nC0,T1,1\nC0,T2,yes\n');

      await expect(createAnalyzeCommand().parseAsync(['node', 'test', '--input', input])).rejects.toThrow(
        'process.exit called'
      );

      expect(logger.error).toHaveBeenCalledWith(`${input}:3: column task_success expects an integer, got "yes"`);
    });
  });
});
