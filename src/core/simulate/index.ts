/**
 * Barrel exports for simulate module.
 */
export { TrialSimulator, readinessScore, SIMULATION_CONSTANTS } from './simulator.js';
export { JUDGE_KEYS } from './types.js';
export type { OutcomeRecord, JudgeScores, TrialStatus } from './types.js';
