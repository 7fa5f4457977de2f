/**
 * Tests for the run command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';
import { createRunCommand } from '../../../../src/cli/commands/run.js';
import { logger } from '../../../../src/utils/logger.js';

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    setLevel: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(() => ({ debug: vi.fn() })),
  },
  resolveLogLevel: vi.fn(() => 'info'),
}));

const SUITE_PATH = fileURLToPath(new URL('../../../../tasks/task_suite_v1.json', import.meta.url));

function dataLines(filePath: string): string[] {
  return readFileSync(filePath, 'utf-8').trimEnd().split('\n').slice(1);
}

describe('run command', () => {
  let tempDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    tempDir = join(tmpdir(), `ablate-run-test-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
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

  describe('createRunCommand', () => {
    it('creates a command named run', () => {
      expect(createRunCommand().name()).toBe('run');
    });

    it('has expected options', () => {
      const optionNames = createRunCommand().options.map((o) => o.long);
      expect(optionNames).toEqual([
        '--mode',
        '--task-suite',
        '--conditions',
        '--models',
        '--tiers',
        '--repo-types',
        '--repeats',
        '--seed',
        '--max-tasks',
        '--output',
        '--latest',
        '--config',
        '--json',
        '--verbose',
      ]);
    });

    it('defaults mode to simulate', () => {
      const mode = createRunCommand().options.find((o) => o.long === '--mode');
      expect(mode?.defaultValue).toBe('simulate');
    });
  });

  describe('runRun', () => {
    it('writes the run CSV and the latest copy', async () => {
      await createRunCommand().parseAsync([
        'node', 'test',
        '--task-suite', SUITE_PATH,
        '--conditions', 'C0,C4',
        '--models', 'model-a',
        '--repeats', '1',
        '--output', 'out/run.csv',
        '--latest', 'out/latest.csv',
      ]);

      const output = join(tempDir, 'out', 'run.csv');
      const latest = join(tempDir, 'out', 'latest.csv');
      expect(dataLines(output)).toHaveLength(24);
      expect(readFileSync(latest, 'utf-8')).toBe(readFileSync(output, 'utf-8'));
      expect(logger.success).toHaveBeenCalledWith(`Wrote 24 rows: ${output}`);
      expect(logger.success).toHaveBeenCalledWith(`Updated latest pointer: ${latest}`);
    });

    it('writes identical outcomes for the same seed', async () => {
      const args = ['node', 'test', '--task-suite', SUITE_PATH, '--repeats', '1', '--seed', '42'];
      await createRunCommand().parseAsync([...args, '--output', 'a.csv', '--latest', 'a.csv']);
      await createRunCommand().parseAsync([...args, '--output', 'b.csv', '--latest', 'b.csv']);

      // Columns after timestamp_utc carry no run identity
      const strip = (line: string) => line.split(',').slice(4).join(',');
      expect(dataLines(join(tempDir, 'b.csv')).map(strip)).toEqual(dataLines(join(tempDir, 'a.csv')).map(strip));
      expect(logger.success).not.toHaveBeenCalledWith(expect.stringContaining('Updated latest pointer'));
    });

    it('uses the config file and lets flags override it', async () => {
      mkdirSync(join(tempDir, '.ablate'));
      writeFileSync(
        join(tempDir, '.ablate', 'config.yaml'),
        `run:\n  task_suite: ${JSON.stringify(SUITE_PATH)}\n  conditions: C0\n  repeats: 2\n  latest: latest.csv\n`
      );

      await createRunCommand().parseAsync(['node', 'test', '--output', 'from-config.csv']);
      await createRunCommand().parseAsync(['node', 'test', '--output', 'with-flag.csv', '--repeats', '1']);

      expect(dataLines(join(tempDir, 'from-config.csv'))).toHaveLength(12 * 2 * 2);
      expect(dataLines(join(tempDir, 'with-flag.csv'))).toHaveLength(12 * 2);
      expect(existsSync(join(tempDir, 'latest.csv'))).toBe(true);
    });

    it('prints a JSON summary with --json', async () => {
      await createRunCommand().parseAsync([
        'node', 'test',
        '--task-suite', SUITE_PATH,
        '--tiers', 'T3',
        '--conditions', 'C2',
        '--repeats', '1',
        '--output', 'run.csv',
        '--latest', 'latest.csv',
        '--json',
      ]);

      const printed = JSON.parse(String(vi.mocked(console.log).mock.calls[0]?.[0]));
      expect(printed).toMatchObject({
        rows: 4 * 2,
        seed: 20260220,
        output: join(tempDir, 'run.csv'),
        latest: join(tempDir, 'latest.csv'),
      });
      expect(logger.success).not.toHaveBeenCalled();
    });

    it('reports unknown conditions and exits', async () => {
      await expect(
        createRunCommand().parseAsync(['node', 'test', '--task-suite', SUITE_PATH, '--conditions', 'C0,C7'])
      ).rejects.toThrow('process.exit called');

      expect(logger.error).toHaveBeenCalledWith('--conditions includes unsupported values: C7; allowed=C0, C1, C2, C3, C4');
      expect(process.exit).toHaveBeenCalledWith(1);
    });

    it('rejects live mode', async () => {
      await expect(
        createRunCommand().parseAsync(['node', 'test', '--task-suite', SUITE_PATH, '--mode', 'live'])
      ).rejects.toThrow('process.exit called');

      expect(logger.error).toHaveBeenCalledWith('Live mode is not wired yet. Use --mode simulate for this track.');
    });

    it('fails when the filters select no task', async () => {
      const suite = join(tempDir, 'suite.json');
      writeFileSync(
        suite,
        JSON.stringify({
          tasks: [
            {
              task_id: 'only',
              title: 'Only task',
              tier: 'T1',
              repo_type: 'library_cli',
              repo_slug: 'demo',
              repo_locator: 'fixtures/demo',
              summary: 'Example',
              acceptance_checks: ['tests pass'],
            },
          ],
        })
      );

      await expect(
        createRunCommand().parseAsync(['node', 'test', '--task-suite', suite, '--tiers', 'T3'])
      ).rejects.toThrow('process.exit called');
      expect(logger.error).toHaveBeenCalledWith(
        'No tasks selected after filters. Adjust --tiers/--repo-types/--max-tasks.'
      );
    });

    it('reports a missing task suite', async () => {
      const missing = join(tempDir, 'none.json');

      await expect(createRunCommand().parseAsync(['node', 'test', '--task-suite', missing])).rejects.toThrow(
        'process.exit called'
      );
      expect(logger.error).toHaveBeenCalledWith(`File does not exist: ${missing}`);
    });

    it('rejects a non-integer repeat count', async () => {
      const command = createRunCommand()
        .exitOverride()
        .configureOutput({ writeErr: () => {} });

      await expect(command.parseAsync(['node', 'test', '--repeats', 'many'])).rejects.toMatchObject({
        code: 'commander.invalidArgument',
      });
    });
  });
});
