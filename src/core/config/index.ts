/**
 * Configuration module exports.
 */
export { loadConfig, getDefaultConfig, getConfigPath, toRunPlanInput, toGatePolicy } from './loader.js';
export { ConfigSchema, RunSettingsSchema, AnalysisSettingsSchema, GateThresholdsSchema } from './schema.js';
export type { Config, RunSettings, AnalysisSettings } from './schema.js';
