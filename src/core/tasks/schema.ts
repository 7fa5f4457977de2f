/**
 * Schema for task-suite entries as written on disk (snake_case keys).
 */
import { z } from 'zod';
import { REPO_TYPE_ORDER, TIER_ORDER } from '../registry/types.js';

export const REQUIRED_TASK_KEYS = [
  'task_id',
  'title',
  'tier',
  'repo_type',
  'repo_slug',
  'repo_locator',
  'summary',
  'acceptance_checks',
] as const;

export const TaskEntrySchema = z.looseObject({
  task_id: z.string().min(1),
  title: z.string(),
  tier: z.enum(TIER_ORDER),
  repo_type: z.enum(REPO_TYPE_ORDER),
  repo_slug: z.string(),
  repo_locator: z.string(),
  summary: z.string(),
  acceptance_checks: z.array(z.string()).min(1),
});

export type TaskEntry = z.infer<typeof TaskEntrySchema>;
