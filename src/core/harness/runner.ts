/**
 * Trial matrix generation.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { SeededRandom } from '../random/seeded-random.js';
import type { ExperimentRegistry } from '../registry/types.js';
import { TrialSimulator } from '../simulate/simulator.js';
import { filterTasks } from '../tasks/loader.js';
import type { Task } from '../tasks/types.js';
import { EXPERIMENT_ID, SCHEMA_VERSION, type ExperimentRun, type RunPlan, type TrialRow } from './types.js';

export interface RunOptions {
  /** Clock for the run id and timestamp */
  now?: Date;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * UTC timestamp as YYYYMMDD_HHMMSS.
 */
export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Simulate every task x condition x model x repeat of the plan.
 *
 * One seeded stream drives the whole run and is advanced strictly in
 * loop order, so the same plan and task list always yield the same rows.
 */
export function runExperiment(
  plan: RunPlan,
  tasks: readonly Task[],
  registry: ExperimentRegistry,
  options: RunOptions = {}
): ExperimentRun {
  const selected = filterTasks(tasks, { tiers: plan.tiers, repoTypes: plan.repoTypes, maxTasks: plan.maxTasks });
  if (selected.length === 0) {
    throw new ConfigError(
      ErrorCodes.EMPTY_SELECTION,
      'No tasks selected after filters. Adjust --tiers/--repo-types/--max-tasks.',
      { tiers: [...plan.tiers], repoTypes: [...plan.repoTypes], maxTasks: plan.maxTasks }
    );
  }

  const conditions = plan.conditions.map((id) => {
    const config = registry.conditions.get(id);
    if (!config) {
      throw new ConfigError(ErrorCodes.UNKNOWN_VALUE, `Unknown condition: ${id}`, { condition: id });
    }
    return config;
  });
  const models = plan.models.map((name) => {
    const profile = registry.models.get(name);
    if (!profile) {
      throw new ConfigError(ErrorCodes.UNKNOWN_VALUE, `Unknown model: ${name}`, { model: name });
    }
    return profile;
  });

  const timestampUtc = formatRunTimestamp(options.now ?? new Date());
  const runId = `${EXPERIMENT_ID}-${timestampUtc}`;
  const simulator = new TrialSimulator(registry.tables);
  const rng = new SeededRandom(plan.seed);
  const log = logger.child('run');

  log.debug('Generating trial matrix', {
    tasks: selected.length,
    conditions: plan.conditions,
    models: plan.models,
    repeats: plan.repeats,
    seed: plan.seed,
  });

  const rows: TrialRow[] = [];
  let trialId = 1;
  for (const task of selected) {
    for (const condition of conditions) {
      for (const model of models) {
        for (let repeatIndex = 1; repeatIndex <= plan.repeats; repeatIndex++) {
          rows.push(Object.freeze({
            schemaVersion: SCHEMA_VERSION,
            experimentId: EXPERIMENT_ID,
            runId,
            timestampUtc,
            mode: plan.mode,
            seed: plan.seed,
            trialId,
            taskId: task.taskId,
            taskTitle: task.title,
            taskTier: task.tier,
            repoType: task.repoType,
            repoSlug: task.repoSlug,
            repoLocator: task.repoLocator,
            model: model.model,
            condition: condition.condition,
            conditionLabel: condition.label,
            repeatIndex,
            hasContextFiles: condition.hasContextFiles,
            discoveryInstruction: condition.discoveryInstruction,
            inlineStrategy: condition.inlineStrategy,
            inlineBudgetTokens: condition.inlineBudgetTokens,
            outcome: simulator.simulate(task, condition, model, rng),
          }));
          trialId++;
        }
      }
    }
  }

  return { runId, timestampUtc, plan, rows };
}

/**
 * Share of rows whose task succeeded; 0 for an empty run.
 */
export function overallSuccessRate(rows: readonly TrialRow[]): number {
  if (rows.length === 0) return 0;
  return rows.filter((row) => row.outcome.taskSuccess).length / rows.length;
}
