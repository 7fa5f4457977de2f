/**
 * Task suite types.
 */
import type { RepoType, Tier } from '../registry/types.js';

/**
 * One coding task in the suite. Frozen once loaded.
 */
export interface Task {
  readonly taskId: string;
  readonly title: string;
  readonly tier: Tier;
  readonly repoType: RepoType;
  readonly repoSlug: string;
  readonly repoLocator: string;
  readonly summary: string;
  /** Never empty */
  readonly acceptanceChecks: readonly string[];
  /** Any keys beyond the required ones, kept verbatim */
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface TaskFilter {
  tiers: ReadonlySet<Tier>;
  repoTypes: ReadonlySet<RepoType>;
  /** 0 keeps every match */
  maxTasks: number;
}
