/**
 * `ablate run`: simulate the trial matrix and write the run CSV.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig, toRunPlanInput } from '../../core/config/loader.js';
import { createRegistry } from '../../core/registry/index.js';
import { loadTaskSuite } from '../../core/tasks/loader.js';
import { resolveRunPlan } from '../../core/harness/plan.js';
import { overallSuccessRate, runExperiment } from '../../core/harness/runner.js';
import { formatTrialCsv } from '../../core/trials/codec.js';
import { copyFileIfDistinct, writeFile } from '../../utils/file-system.js';
import { logger, resolveLogLevel } from '../../utils/logger.js';
import { parseInteger } from './options.js';

interface RunCommandOptions {
  mode?: string;
  taskSuite?: string;
  conditions?: string;
  models?: string;
  tiers?: string;
  repoTypes?: string;
  repeats?: number;
  seed?: number;
  maxTasks?: number;
  output?: string;
  latest?: string;
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Create the run command.
 */
export function createRunCommand(): Command {
  return new Command('run')
    .description('Simulate context-condition trials and write a run CSV')
    .option('--mode <mode>', 'Execution mode (simulate | live)', 'simulate')
    .option('--task-suite <path>', 'Task suite JSON/YAML file')
    .option('--conditions <list>', 'Comma-separated condition ids (e.g. C0,C2,C4)')
    .option('--models <list>', 'Comma-separated model ids')
    .option('--tiers <list>', 'Comma-separated tiers (T1,T2,T3)')
    .option('--repo-types <list>', 'Comma-separated repository archetypes')
    .option('--repeats <n>', 'Repeats per task/condition/model', parseInteger)
    .option('--seed <n>', 'Random seed', parseInteger)
    .option('--max-tasks <n>', 'Use at most n tasks after filtering (0 = all)', parseInteger)
    .option('--output <path>', 'Run CSV path (default: <data_dir>/runs_<timestamp>.csv)')
    .option('--latest <path>', 'Copy of the newest run CSV')
    .option('--config <path>', 'Config file (default: .ablate/config.yaml)')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Show debug logging')
    .action(async (options: RunCommandOptions) => {
      try {
        await runRun(options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runRun(options: RunCommandOptions): Promise<void> {
  logger.setLevel(resolveLogLevel(options));
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  const registry = createRegistry();

  // Flags win over the config file
  const fromConfig = toRunPlanInput(config.run);
  const plan = resolveRunPlan(
    {
      mode: options.mode,
      conditions: options.conditions ?? fromConfig.conditions,
      models: options.models ?? fromConfig.models,
      tiers: options.tiers ?? fromConfig.tiers,
      repoTypes: options.repoTypes ?? fromConfig.repoTypes,
      repeats: options.repeats ?? fromConfig.repeats,
      seed: options.seed ?? fromConfig.seed,
      maxTasks: options.maxTasks ?? fromConfig.maxTasks,
    },
    registry
  );

  const suitePath = path.resolve(projectRoot, options.taskSuite ?? config.run.task_suite);
  const tasks = await loadTaskSuite(suitePath);
  logger.debug(`Loaded ${tasks.length} tasks from ${suitePath}`);

  const run = runExperiment(plan, tasks, registry);

  const outputPath = path.resolve(
    projectRoot,
    options.output ?? path.join(config.run.data_dir, `runs_${run.timestampUtc}.csv`)
  );
  const latestPath = path.resolve(projectRoot, options.latest ?? config.run.latest);
  await writeFile(outputPath, formatTrialCsv(run.rows));
  const copied = await copyFileIfDistinct(outputPath, latestPath);

  const successRate = overallSuccessRate(run.rows);
  if (options.json) {
    console.log(
      JSON.stringify(
        {
          runId: run.runId,
          rows: run.rows.length,
          seed: plan.seed,
          output: outputPath,
          latest: latestPath,
          overallSuccessRate: successRate,
        },
        null,
        2
      )
    );
    return;
  }

  logger.success(`Wrote ${run.rows.length} rows: ${outputPath}`);
  if (copied) {
    logger.success(`Updated latest pointer: ${latestPath}`);
  }
  logger.info(`Overall success rate: ${successRate.toFixed(3)}`);
}
