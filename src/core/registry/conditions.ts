/**
 * Condition definitions. C0 exposes no context and carries zero deltas.
 */
import type { ConditionConfig } from './types.js';

export const CONDITION_CONFIGS: readonly ConditionConfig[] = [
  {
    condition: 'C0',
    label: 'no_context',
    hasContextFiles: false,
    discoveryInstruction: false,
    inlineStrategy: 'none',
    inlineBudgetTokens: 0,
    successDelta: 0.0,
    readinessDelta: 0.0,
    runtimeDelta: 0.0,
    tokenDelta: 0.0,
    utilizationBoost: 0.0,
  },
  {
    condition: 'C1',
    label: 'files_present_silent',
    hasContextFiles: true,
    discoveryInstruction: false,
    inlineStrategy: 'none',
    inlineBudgetTokens: 0,
    successDelta: 0.01,
    readinessDelta: 0.01,
    runtimeDelta: 0.01,
    tokenDelta: 0.02,
    utilizationBoost: 0.03,
  },
  {
    condition: 'C2',
    label: 'files_plus_discovery_instruction',
    hasContextFiles: true,
    discoveryInstruction: true,
    inlineStrategy: 'none',
    inlineBudgetTokens: 0,
    successDelta: 0.06,
    readinessDelta: 0.05,
    runtimeDelta: 0.04,
    tokenDelta: 0.06,
    utilizationBoost: 0.22,
  },
  {
    condition: 'C3',
    label: 'full_root_inline',
    hasContextFiles: true,
    discoveryInstruction: true,
    inlineStrategy: 'full_root',
    inlineBudgetTokens: 1600,
    successDelta: 0.07,
    readinessDelta: 0.05,
    runtimeDelta: 0.18,
    tokenDelta: 0.32,
    utilizationBoost: 0.3,
  },
  {
    condition: 'C4',
    label: 'summary_inline_plus_retrieval',
    hasContextFiles: true,
    discoveryInstruction: true,
    inlineStrategy: 'summary_plus_retrieval',
    inlineBudgetTokens: 400,
    successDelta: 0.08,
    readinessDelta: 0.07,
    runtimeDelta: 0.08,
    tokenDelta: 0.14,
    utilizationBoost: 0.28,
  },
];
