/**
 * Import of externally produced task lists
 */

import type { Role, TaskDraft } from '../types.js';
import { ImportedTaskListSchema, type ImportedTask } from '../utils/validation.js';

export interface TaskListImportOptions {
  /** Role for entries that name no owner */
  defaultRole?: Role;
}

export class TaskListFormatError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid task list: ${issues.join('; ')}`);
    this.name = 'TaskListFormatError';
    this.issues = issues;
  }
}

function toDraft(entry: ImportedTask, defaultRole: Role): TaskDraft {
  const id = entry.id ?? entry.task_id ?? '';
  const dependencies = entry.dependencies ?? entry.blockedBy ?? [];

  return {
    id: String(id),
    role: entry.agent_role ?? entry.owner ?? entry.role ?? defaultRole,
    description: entry.description || entry.subject || '',
    dependencies: dependencies.map(String),
    priority: entry.priority,
  };
}

/**
 * Parse a task list (JSON text or an already decoded value) into drafts.
 * Imported tasks always start pending whatever status the list carries.
 */
export function parseTaskList(input: unknown, options: TaskListImportOptions = {}): TaskDraft[] {
  let raw: unknown = input;
  if (typeof input === 'string') {
    try {
      raw = JSON.parse(input);
    } catch (error) {
      throw new TaskListFormatError([error instanceof Error ? error.message : String(error)]);
    }
  }

  const result = ImportedTaskListSchema.safeParse(raw);
  if (!result.success) {
    throw new TaskListFormatError(result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }

  const defaultRole = options.defaultRole ?? 'builder';
  return result.data.map(entry => toDraft(entry, defaultRole));
}
