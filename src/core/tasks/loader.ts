/**
 * Task-suite loading. Validation fails fast on the first bad task and
 * names it by id (or by 1-based position when the id itself is missing).
 */
import { loadYaml, formatZodError } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { REPO_TYPE_ORDER, TIER_ORDER, isRepoType, isTier } from '../registry/types.js';
import { REQUIRED_TASK_KEYS, TaskEntrySchema } from './schema.js';
import type { Task, TaskFilter } from './types.js';

const REQUIRED_KEY_SET: ReadonlySet<string> = new Set(REQUIRED_TASK_KEYS);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function taskLabel(entry: Record<string, unknown>, index: number): string {
  const id = entry.task_id;
  return typeof id === 'string' && id.length > 0 ? id : `#${index}`;
}

function validateEntry(entry: unknown, index: number, source: string): Task {
  if (!isRecord(entry)) {
    throw new ConfigError(ErrorCodes.INVALID_TASK, `Invalid task at index ${index} in ${source}: expected object.`, {
      index,
    });
  }

  const label = taskLabel(entry, index);
  const missing = REQUIRED_TASK_KEYS.filter((key) => !(key in entry)).sort();
  if (missing.length > 0) {
    throw new ConfigError(ErrorCodes.INVALID_TASK, `Task ${label} missing required keys: ${missing.join(', ')}`, {
      task: label,
      missing,
    });
  }
  if (!isTier(entry.tier)) {
    throw new ConfigError(
      ErrorCodes.INVALID_TASK,
      `Task ${label} has unsupported tier: ${String(entry.tier)}; allowed=${TIER_ORDER.join(', ')}`,
      { task: label, tier: entry.tier }
    );
  }
  if (!isRepoType(entry.repo_type)) {
    throw new ConfigError(
      ErrorCodes.INVALID_TASK,
      `Task ${label} has unsupported repo_type: ${String(entry.repo_type)}; allowed=${REPO_TYPE_ORDER.join(', ')}`,
      { task: label, repoType: entry.repo_type }
    );
  }
  if (!Array.isArray(entry.acceptance_checks) || entry.acceptance_checks.length === 0) {
    throw new ConfigError(ErrorCodes.INVALID_TASK, `Task ${label} must include non-empty acceptance_checks.`, {
      task: label,
    });
  }

  const parsed = TaskEntrySchema.safeParse(entry);
  if (!parsed.success) {
    throw new ConfigError(ErrorCodes.INVALID_TASK, `Task ${label} is invalid: ${formatZodError(parsed.error)}`, {
      task: label,
      errors: parsed.error.issues,
    });
  }

  const data = parsed.data;
  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!REQUIRED_KEY_SET.has(key)) {
      metadata[key] = value;
    }
  }

  return Object.freeze({
    taskId: data.task_id,
    title: data.title,
    tier: data.tier,
    repoType: data.repo_type,
    repoSlug: data.repo_slug,
    repoLocator: data.repo_locator,
    summary: data.summary,
    acceptanceChecks: Object.freeze([...data.acceptance_checks]),
    metadata: Object.freeze(metadata),
  });
}

/**
 * Validate an already-parsed suite document of the form `{ tasks: [...] }`.
 */
export function parseTaskSuite(document: unknown, source = 'task suite'): Task[] {
  if (!isRecord(document) || !('tasks' in document)) {
    throw new ConfigError(ErrorCodes.INVALID_TASK_SUITE, `Invalid task suite at ${source}: expected object with 'tasks'.`, {
      source,
    });
  }
  const tasks = document.tasks;
  if (!Array.isArray(tasks) || tasks.length === 0) {
    throw new ConfigError(
      ErrorCodes.INVALID_TASK_SUITE,
      `Invalid task suite at ${source}: 'tasks' must be a non-empty list.`,
      { source }
    );
  }
  return tasks.map((entry: unknown, index) => validateEntry(entry, index + 1, source));
}

/**
 * Load a task suite from a JSON or YAML file.
 */
export async function loadTaskSuite(filePath: string): Promise<Task[]> {
  const document = await loadYaml(filePath);
  return parseTaskSuite(document, filePath);
}

/**
 * Keep tasks whose tier and archetype are selected, in suite order.
 */
export function filterTasks(tasks: readonly Task[], filter: TaskFilter): Task[] {
  const selected = tasks.filter((task) => filter.tiers.has(task.tier) && filter.repoTypes.has(task.repoType));
  return filter.maxTasks > 0 ? selected.slice(0, filter.maxTasks) : selected;
}
