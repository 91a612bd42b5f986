/**
 * Coordinator error hierarchy
 *
 * Every failure the core surfaces to a caller is a CoordinatorError with a
 * stable `code`. Storage I/O errors are not wrapped: they reach the caller
 * exactly as better-sqlite3 raised them.
 */

export type CoordinatorErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'CYCLIC_DEPENDENCY'
  | 'ALREADY_ACTIVE'
  | 'DUPLICATE_TASK';

export class CoordinatorError extends Error {
  readonly code: CoordinatorErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: CoordinatorErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'CoordinatorError';
    this.code = code;
    this.context = context;
  }

  toLogString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `[${this.code}] ${this.message}${contextStr}`;
  }
}

export type EntityKind = 'session' | 'task' | 'agent';

export class NotFoundError extends CoordinatorError {
  readonly entity: EntityKind;
  readonly entityId: string;

  constructor(entity: EntityKind, entityId: string, context?: Record<string, unknown>) {
    super('NOT_FOUND', `${entity} '${entityId}' not found`, { entity, entityId, ...context });
    this.name = 'NotFoundError';
    this.entity = entity;
    this.entityId = entityId;
  }
}

export class InvalidTransitionError extends CoordinatorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('INVALID_TRANSITION', message, context);
    this.name = 'InvalidTransitionError';
  }
}

export class CyclicDependencyError extends CoordinatorError {
  readonly taskId: string;
  /** Dependency path that leads back to `taskId` */
  readonly cycle: string[];

  constructor(taskId: string, cycle: string[]) {
    super('CYCLIC_DEPENDENCY', `Task '${taskId}' would depend on itself: ${cycle.join(' -> ')}`, {
      taskId,
      cycle,
    });
    this.name = 'CyclicDependencyError';
    this.taskId = taskId;
    this.cycle = cycle;
  }
}

export class AlreadyActiveError extends CoordinatorError {
  readonly role: string;
  readonly activeAgentId: string;

  constructor(role: string, activeAgentId: string) {
    super(
      'ALREADY_ACTIVE',
      `Role '${role}' already has an active agent (${activeAgentId}); retire it first`,
      { role, activeAgentId }
    );
    this.name = 'AlreadyActiveError';
    this.role = role;
    this.activeAgentId = activeAgentId;
  }
}

export class DuplicateTaskError extends CoordinatorError {
  constructor(taskId: string) {
    super('DUPLICATE_TASK', `Task '${taskId}' already exists`, { taskId });
    this.name = 'DuplicateTaskError';
  }
}

export function isCoordinatorError(error: unknown): error is CoordinatorError {
  return error instanceof CoordinatorError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
