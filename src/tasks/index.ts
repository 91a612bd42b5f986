/**
 * Tasks module - dependency graph and task-list import
 */

export {
  TaskGraph,
  cloneTask,
  compareReadiness,
  findCycle,
  DEFAULT_TASK_PRIORITY,
  type TaskGraphOptions,
  type TaskFilter,
  type TaskUpdate,
} from './task-graph.js';
export type { AcceptanceToken } from './acceptance.js';
export { parseTaskList, TaskListFormatError, type TaskListImportOptions } from './task-import.js';
