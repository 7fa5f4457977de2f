export { loadTaskSuite, parseTaskSuite, filterTasks } from './loader.js';
export { REQUIRED_TASK_KEYS, TaskEntrySchema } from './schema.js';
export type { TaskEntry } from './schema.js';
export type { Task, TaskFilter } from './types.js';
