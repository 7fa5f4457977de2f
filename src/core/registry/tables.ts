/**
 * Base rates by tier and archetype, and the sparse condition x tier
 * interactions. Only C3 and C4 interact with tier.
 */
import type { SimulationTables } from './types.js';

export const SIMULATION_TABLES: SimulationTables = {
  tierSuccessBase: { T1: 0.74, T2: 0.58, T3: 0.43 },
  repoSuccessDelta: {
    library_cli: 0.02,
    service_backend: -0.02,
    fullstack_app: -0.05,
    monorepo: -0.08,
  },
  tierRuntimeBase: { T1: 900, T2: 2400, T3: 5100 },
  repoRuntimeMultiplier: {
    library_cli: 0.8,
    service_backend: 1.0,
    fullstack_app: 1.16,
    monorepo: 1.3,
  },
  tierInputTokenBase: { T1: 5500, T2: 14500, T3: 29000 },
  repoTokenMultiplier: {
    library_cli: 0.85,
    service_backend: 1.0,
    fullstack_app: 1.15,
    monorepo: 1.35,
  },
  tierContextBase: { T1: 0.2, T2: 0.38, T3: 0.52 },
  conditionTierSuccessBonus: {
    C3: { T1: -0.03, T2: 0.05, T3: 0.09 },
    C4: { T1: 0.02, T2: 0.07, T3: 0.08 },
  },
  // Inlining the full root file slows down easy tasks
  conditionTierRuntimeSurcharge: {
    C3: { T1: 1.1 },
  },
  conditionTierMinimalityPenalty: {
    C3: { T1: 0.15, T2: 0.1, T3: 0.1 },
    C4: { T1: 0.05 },
  },
  utilizationRuntimeExemptTiers: ['T1'],
};
