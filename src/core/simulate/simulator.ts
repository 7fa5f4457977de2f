/**
 * Synthetic trial simulator.
 *
 * A trial's outcome is a pure function of its explicit inputs and the
 * random stream. Draws happen in this fixed order, and changing it changes
 * every result for a given seed:
 *
 *   1. success noise, success draw
 *   2. tests-passed draw (only when the success draw failed)
 *   3. utilisation noise, utilisation draw (only with context files)
 *   4. runtime noise
 *   5. input-token noise, output-token noise
 *   6. judge noise: correctness, maintainability, architectural fit,
 *      test quality, minimality
 */
import { clamp, roundTo } from '../../utils/stats.js';
import type { RandomSource } from '../random/seeded-random.js';
import type { ConditionConfig, ConditionTierTable, ModelProfile, SimulationTables, Tier } from '../registry/types.js';
import type { Task } from '../tasks/types.js';
import { JUDGE_KEYS, type JudgeScores, type OutcomeRecord } from './types.js';

/**
 * Half-widths of the uniform noise terms and the fixed model constants.
 */
export const SIMULATION_CONSTANTS = Object.freeze({
  successNoise: 0.05,
  successFloor: 0.02,
  successCeiling: 0.98,
  /** Tests can pass on a rejected task */
  testsPassWithoutSuccess: 0.08,
  utilizationNoise: 0.04,
  utilizationRuntimeMultiplier: 1.04,
  runtimeNoise: 0.1,
  runtimeFloorSeconds: 120,
  inputTokenNoise: 0.09,
  inputTokenFloor: 800,
  outputTokenNoise: 0.08,
  outputTokenFloor: 200,
  outputBonusOnSuccess: 0.11,
  outputPenaltyOnFailure: -0.06,
  readinessBonusTestsPassed: 0.08,
  readinessPenaltyTestsFailed: -0.12,
});

/**
 * Judge formulas: base + indicator bonuses + bias terms + noise, clamped to [0, 1].
 */
const JUDGES = Object.freeze({
  correctness: { base: 0.25, onSuccess: 0.56, onFailure: 0.2, noise: 0.07 },
  maintainability: { base: 0.44, onSuccess: 0.2, onFailure: -0.04, noise: 0.08 },
  architecturalFit: { base: 0.4, onUtilized: 0.26, onSuccess: 0.16, noise: 0.08 },
  testQuality: { base: 0.38, onTestsPassed: 0.28, onTestsFailed: -0.05, noise: 0.08 },
  minimality: { base: 0.64, noise: 0.07 },
});

function lookup(table: ConditionTierTable, condition: ConditionConfig, tier: Tier, neutral: number): number {
  return table[condition.condition]?.[tier] ?? neutral;
}

/**
 * Mean of the five judges plus the tests bonus or penalty, clamped to [0, 1].
 */
export function readinessScore(judges: Readonly<JudgeScores>, testsPassed: boolean): number {
  const mean = JUDGE_KEYS.reduce((sum, key) => sum + judges[key], 0) / JUDGE_KEYS.length;
  const adjustment = testsPassed
    ? SIMULATION_CONSTANTS.readinessBonusTestsPassed
    : SIMULATION_CONSTANTS.readinessPenaltyTestsFailed;
  return clamp(mean + adjustment, 0, 1);
}

export class TrialSimulator {
  constructor(private readonly tables: SimulationTables) {}

  simulate(task: Task, condition: ConditionConfig, model: ModelProfile, rng: RandomSource): OutcomeRecord {
    const c = SIMULATION_CONSTANTS;
    const { tables } = this;
    const { tier, repoType } = task;

    const successProbability = clamp(
      tables.tierSuccessBase[tier] +
        tables.repoSuccessDelta[repoType] +
        model.successBias +
        condition.successDelta +
        lookup(tables.conditionTierSuccessBonus, condition, tier, 0) +
        rng.uniform(-c.successNoise, c.successNoise),
      c.successFloor,
      c.successCeiling
    );
    let taskSuccess = rng.chance(successProbability);
    // Short-circuit: no tests draw when the task succeeded
    const testsPassed = taskSuccess || rng.chance(c.testsPassWithoutSuccess);
    if (!testsPassed) {
      taskSuccess = false;
    }

    let contextUtilized = false;
    if (condition.hasContextFiles) {
      const utilizationProbability = clamp(
        tables.tierContextBase[tier] +
          condition.utilizationBoost +
          model.utilizationBonus +
          rng.uniform(-c.utilizationNoise, c.utilizationNoise),
        0,
        1
      );
      contextUtilized = rng.chance(utilizationProbability);
    }

    let runtimeSeconds = tables.tierRuntimeBase[tier] * tables.repoRuntimeMultiplier[repoType];
    runtimeSeconds *= 1 + condition.runtimeDelta;
    runtimeSeconds *= lookup(tables.conditionTierRuntimeSurcharge, condition, tier, 1);
    if (contextUtilized && !tables.utilizationRuntimeExemptTiers.includes(tier)) {
      runtimeSeconds *= c.utilizationRuntimeMultiplier;
    }
    runtimeSeconds *= 1 + rng.uniform(-c.runtimeNoise, c.runtimeNoise);
    runtimeSeconds = Math.max(c.runtimeFloorSeconds, runtimeSeconds);

    const inputTokens = Math.trunc(
      Math.max(
        c.inputTokenFloor,
        tables.tierInputTokenBase[tier] *
          tables.repoTokenMultiplier[repoType] *
          model.tokenMultiplier *
          (1 + condition.tokenDelta) *
          (1 + rng.uniform(-c.inputTokenNoise, c.inputTokenNoise))
      )
    );
    const outputTokens = Math.trunc(
      Math.max(
        c.outputTokenFloor,
        inputTokens *
          model.outputRatio *
          (1 + (taskSuccess ? c.outputBonusOnSuccess : c.outputPenaltyOnFailure)) *
          (1 + rng.uniform(-c.outputTokenNoise, c.outputTokenNoise))
      )
    );
    const estimatedCostUsd =
      (inputTokens / 1000) * model.inputCostPer1k + (outputTokens / 1000) * model.outputCostPer1k;

    const judges = this.scoreJudges(task, condition, model, rng, { taskSuccess, testsPassed, contextUtilized });

    const record: OutcomeRecord = {
      taskSuccess,
      testsPassed,
      contextUtilized,
      status: testsPassed ? 'ok' : 'failed_checks',
      runtimeSeconds: roundTo(runtimeSeconds, 2),
      inputTokens,
      outputTokens,
      totalTokens: inputTokens + outputTokens,
      estimatedCostUsd: roundTo(estimatedCostUsd, 4),
      judges: Object.freeze({
        correctness: roundTo(judges.correctness, 4),
        maintainability: roundTo(judges.maintainability, 4),
        architecturalFit: roundTo(judges.architecturalFit, 4),
        testQuality: roundTo(judges.testQuality, 4),
        minimality: roundTo(judges.minimality, 4),
      }),
      // Readiness is computed from the unrounded judges
      prReadinessScore: roundTo(readinessScore(judges, testsPassed), 4),
    };
    return Object.freeze(record);
  }

  private scoreJudges(
    task: Task,
    condition: ConditionConfig,
    model: ModelProfile,
    rng: RandomSource,
    flags: { taskSuccess: boolean; testsPassed: boolean; contextUtilized: boolean }
  ): JudgeScores {
    const { taskSuccess, testsPassed, contextUtilized } = flags;
    const noise = (halfWidth: number): number => rng.uniform(-halfWidth, halfWidth);

    const correctness = clamp(
      JUDGES.correctness.base +
        (taskSuccess ? JUDGES.correctness.onSuccess : JUDGES.correctness.onFailure) +
        condition.successDelta +
        model.successBias +
        noise(JUDGES.correctness.noise),
      0,
      1
    );
    const maintainability = clamp(
      JUDGES.maintainability.base +
        (taskSuccess ? JUDGES.maintainability.onSuccess : JUDGES.maintainability.onFailure) +
        condition.readinessDelta +
        model.readinessBias +
        noise(JUDGES.maintainability.noise),
      0,
      1
    );
    const architecturalFit = clamp(
      JUDGES.architecturalFit.base +
        (contextUtilized ? JUDGES.architecturalFit.onUtilized : 0) +
        (taskSuccess ? JUDGES.architecturalFit.onSuccess : 0) +
        noise(JUDGES.architecturalFit.noise),
      0,
      1
    );
    const testQuality = clamp(
      JUDGES.testQuality.base +
        (testsPassed ? JUDGES.testQuality.onTestsPassed : JUDGES.testQuality.onTestsFailed) +
        condition.readinessDelta +
        noise(JUDGES.testQuality.noise),
      0,
      1
    );
    const minimality = clamp(
      JUDGES.minimality.base -
        lookup(this.tables.conditionTierMinimalityPenalty, condition, task.tier, 0) +
        noise(JUDGES.minimality.noise),
      0,
      1
    );

    return { correctness, maintainability, architecturalFit, testQuality, minimality };
  }
}
