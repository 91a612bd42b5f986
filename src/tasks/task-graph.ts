/**
 * Task graph - dependency-aware view of one session's tasks
 *
 * The store is the source of truth. Every mutation is written in a single
 * store transaction and only then applied to the in-memory cache, so a
 * failed write leaves both unchanged.
 */

import type { DependencyContext, Role, Task, TaskDraft, TaskStatus } from '../types.js';
import { TASK_STATUS_TRANSITIONS } from '../types.js';
import type { SQLiteStore } from '../store/sqlite-store.js';
import {
  CoordinatorError,
  CyclicDependencyError,
  DuplicateTaskError,
  InvalidTransitionError,
  NotFoundError,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { isLiveAcceptance, redeemAcceptance, type AcceptanceToken } from './acceptance.js';

const log = logger.child('task-graph');

export const DEFAULT_TASK_PRIORITY = 5;

export interface TaskGraphOptions {
  now?: () => Date;
}

export interface TaskFilter {
  status?: TaskStatus;
  role?: Role;
}

/**
 * Pending and modified tasks of one mutation, layered over the cache
 */
type Changes = Map<string, Task>;

/**
 * Fields of a pending task that can be edited in place
 */
export interface TaskUpdate {
  description?: string;
  role?: Role;
  priority?: number;
}

/**
 * Deep copy of a task. Readers get copies so nothing outside the graph can
 * change the cache.
 */
export function cloneTask(task: Task): Task {
  return structuredClone(task);
}

export function compareReadiness(a: Task, b: Task): number {
  return (
    b.priority - a.priority ||
    a.createdAt.getTime() - b.createdAt.getTime() ||
    a.sequence - b.sequence
  );
}

export class TaskGraph {
  readonly sessionId: string;
  private readonly store: SQLiteStore;
  private readonly now: () => Date;
  private tasks: Map<string, Task> = new Map();
  private nextSequence = 1;

  constructor(store: SQLiteStore, sessionId: string, options: TaskGraphOptions = {}) {
    this.store = store;
    this.sessionId = sessionId;
    this.now = options.now ?? (() => new Date());
    this.reload();
  }

  /**
   * Rebuild the cache from the store
   */
  reload(): void {
    this.store.loadSession(this.sessionId);
    this.tasks = new Map(this.store.listTasks(this.sessionId).map(task => [task.id, task]));
    this.nextSequence = this.store.nextTaskSequence(this.sessionId);
    log.debug('Task graph loaded', { sessionId: this.sessionId, tasks: this.tasks.size });
  }

  get size(): number {
    return this.tasks.size;
  }

  get(taskId: string): Task | undefined {
    const task = this.tasks.get(taskId);
    return task && cloneTask(task);
  }

  require(taskId: string): Task {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new NotFoundError('task', taskId, { sessionId: this.sessionId });
    }
    return cloneTask(task);
  }

  /**
   * Tasks in insertion order
   */
  list(filter: TaskFilter = {}): Task[] {
    return [...this.tasks.values()]
      .filter(t => (filter.status === undefined || t.status === filter.status))
      .filter(t => (filter.role === undefined || t.role === filter.role))
      .sort((a, b) => a.sequence - b.sequence)
      .map(cloneTask);
  }

  counts(): Record<TaskStatus, number> {
    const counts: Record<TaskStatus, number> = { pending: 0, in_progress: 0, completed: 0, blocked: 0 };
    for (const task of this.tasks.values()) {
      counts[task.status]++;
    }
    return counts;
  }

  /**
   * Pending tasks whose dependencies are all completed, by priority (high
   * first), then creation time, then insertion order
   */
  readyTasks(role?: Role): Task[] {
    return [...this.tasks.values()]
      .filter(t => t.status === 'pending' && (role === undefined || t.role === role))
      .filter(t => this.dependenciesMet(t))
      .sort(compareReadiness)
      .map(cloneTask);
  }

  /**
   * In-progress tasks running for at least `olderThanMs`
   */
  staleTasks(olderThanMs: number, now: Date = this.now()): Task[] {
    return this.list({ status: 'in_progress' }).filter(
      t => t.startedAt !== undefined && now.getTime() - t.startedAt.getTime() >= olderThanMs
    );
  }

  dependencyContext(taskId: string): DependencyContext[] {
    return this.require(taskId).dependencies.map(depId => {
      const dep = this.require(depId);
      return { taskId: dep.id, description: dep.description, result: dep.result };
    });
  }

  // ==================== Insertion ====================

  /**
   * The error inserting `drafts` would raise, or null. Nothing is mutated.
   */
  validateDrafts(drafts: TaskDraft[]): CoordinatorError | null {
    const batch = new Map<string, TaskDraft>();
    for (const draft of drafts) {
      if (this.tasks.has(draft.id) || batch.has(draft.id)) {
        return new DuplicateTaskError(draft.id);
      }
      batch.set(draft.id, draft);
    }

    for (const draft of drafts) {
      for (const depId of draft.dependencies ?? []) {
        if (!this.tasks.has(depId) && !batch.has(depId)) {
          return new NotFoundError('task', depId, { dependent: draft.id });
        }
      }
    }

    const edges = (id: string): string[] =>
      batch.get(id)?.dependencies ?? this.tasks.get(id)?.dependencies ?? [];

    // Existing tasks are acyclic, so every cycle passes through a draft
    const cycle = findCycle(batch.keys(), edges);
    if (cycle) {
      return new CyclicDependencyError(cycle[0], cycle);
    }

    return null;
  }

  addTask(draft: TaskDraft): Task {
    const [task] = this.addTasks([draft]);
    if (!task) {
      throw new Error('Task insertion produced no task');
    }
    return task;
  }

  /**
   * Insert a batch of tasks. Drafts may reference each other in any order.
   * Either every draft is inserted or none is.
   */
  addTasks(drafts: TaskDraft[]): Task[] {
    const changes = this.prepareInsert(drafts);
    this.commit(changes);
    log.info('Tasks added', { sessionId: this.sessionId, taskIds: drafts.map(d => d.id) });
    return drafts.map(d => this.require(d.id));
  }

  private prepareInsert(drafts: TaskDraft[]): Changes {
    const error = this.validateDrafts(drafts);
    if (error) {
      throw error;
    }

    const now = this.now();
    const changes: Changes = new Map();
    let sequence = this.nextSequence;

    for (const draft of drafts) {
      changes.set(draft.id, {
        id: draft.id,
        sessionId: this.sessionId,
        role: draft.role,
        description: draft.description,
        status: 'pending',
        dependencies: [...new Set(draft.dependencies ?? [])],
        priority: draft.priority ?? DEFAULT_TASK_PRIORITY,
        sequence: sequence++,
        retryCount: 0,
        feedback: [],
        createdAt: now,
        updatedAt: now,
      });
    }

    // New work that hangs off a blocked task is blocked with it
    const blockedTasks = [...this.tasks.values()].filter(t => t.status === 'blocked');
    if (blockedTasks.length > 0) {
      const dependents = this.dependentIndex(changes);
      for (const blocked of blockedTasks) {
        this.propagateBlock(blocked.id, blocked.blockedBy ?? blocked.id, changes, now, dependents);
      }
    }

    return changes;
  }

  // ==================== Status transitions ====================

  markInProgress(taskId: string, agentId?: string): Task {
    const task = this.require(taskId);
    this.assertTransition(task, 'in_progress');

    const incomplete = task.dependencies.filter(id => this.tasks.get(id)?.status !== 'completed');
    if (incomplete.length > 0) {
      throw new InvalidTransitionError(
        `Task '${taskId}' has incomplete dependencies: ${incomplete.join(', ')}`,
        { taskId, incomplete }
      );
    }

    const now = this.now();
    return this.save({ ...task, status: 'in_progress', assignedAgentId: agentId, startedAt: now, updatedAt: now });
  }

  /**
   * Return an in-progress task to pending without counting an attempt
   */
  requeue(taskId: string): Task {
    const task = this.require(taskId);
    this.assertTransition(task, 'pending');

    return this.save({
      ...task,
      status: 'pending',
      assignedAgentId: undefined,
      startedAt: undefined,
      updatedAt: this.now(),
    });
  }

  /**
   * Reassign an in-progress task to another agent of the same role
   */
  reassign(taskId: string, agentId: string): Task {
    const task = this.require(taskId);
    if (task.status !== 'in_progress') {
      throw new InvalidTransitionError(`Task '${taskId}' is ${task.status}, not in_progress`, {
        taskId,
        status: task.status,
      });
    }
    return this.save({ ...task, assignedAgentId: agentId, updatedAt: this.now() });
  }

  /**
   * Block a task and, transitively, every unfinished task depending on it
   */
  markBlocked(taskId: string, reason: string): Task[] {
    const task = this.require(taskId);
    this.assertTransition(task, 'blocked');

    const now = this.now();
    const changes: Changes = new Map();
    changes.set(taskId, {
      ...task,
      status: 'blocked',
      blockedReason: reason,
      blockedBy: undefined,
      assignedAgentId: undefined,
      updatedAt: now,
    });
    this.propagateBlock(taskId, taskId, changes, now);
    this.commit(changes);

    log.warn('Task blocked', { sessionId: this.sessionId, taskId, reason, affected: changes.size });
    return [...changes.values()].map(cloneTask);
  }

  /**
   * Rejection path of the quality gate. The attempt is counted and the
   * feedback recorded; the task goes back to pending, or to blocked when
   * `escalate` is set.
   */
  recordRejection(taskId: string, feedback: string, escalate: boolean): Task {
    const task = this.require(taskId);
    if (task.status !== 'in_progress') {
      throw new InvalidTransitionError(`Task '${taskId}' is ${task.status}, not in_progress`, {
        taskId,
        status: task.status,
      });
    }

    const now = this.now();
    const attempt = task.retryCount + 1;
    const rejected: Task = {
      ...task,
      retryCount: attempt,
      feedback: [...task.feedback, { attempt, feedback, at: now }],
      assignedAgentId: undefined,
      startedAt: undefined,
      updatedAt: now,
    };

    if (!escalate) {
      return this.save({ ...rejected, status: 'pending' });
    }

    const changes: Changes = new Map();
    changes.set(taskId, {
      ...rejected,
      status: 'blocked',
      blockedReason: `Rejected ${attempt} times; last feedback: ${feedback}`,
      blockedBy: undefined,
    });
    this.propagateBlock(taskId, taskId, changes, now);
    this.commit(changes);

    log.warn('Task escalated', { sessionId: this.sessionId, taskId, attempts: attempt });
    return this.require(taskId);
  }

  /**
   * Completion path. Only a live token issued by the quality gate for this
   * task completes it; task drafts carried by the completion are inserted in
   * the same transaction.
   */
  commitAcceptance(token: AcceptanceToken, drafts: TaskDraft[] = []): Task {
    if (!isLiveAcceptance(token) || token.sessionId !== this.sessionId) {
      throw new InvalidTransitionError('Completion requires an unused acceptance token from the quality gate', {
        taskId: token.taskId,
      });
    }

    const task = this.require(token.taskId);
    this.assertTransition(task, 'completed');

    const changes = drafts.length > 0 ? this.prepareInsert(drafts) : new Map<string, Task>();
    const now = this.now();
    changes.set(task.id, {
      ...task,
      status: 'completed',
      result: token.result,
      completedAt: now,
      updatedAt: now,
    });

    redeemAcceptance(token);
    this.commit(changes);

    log.info('Task completed', { sessionId: this.sessionId, taskId: task.id, added: drafts.length });
    return this.require(task.id);
  }

  // ==================== Human overrides ====================

  /**
   * Return a blocked task to pending with a fresh retry budget. Tasks that
   * were blocked only because of it are released as well.
   */
  unblock(taskId: string): Task {
    const task = this.require(taskId);
    if (task.status !== 'blocked') {
      throw new InvalidTransitionError(`Task '${taskId}' is ${task.status}, not blocked`, {
        taskId,
        status: task.status,
      });
    }
    if (task.blockedBy !== undefined) {
      throw new InvalidTransitionError(
        `Task '${taskId}' is blocked by '${task.blockedBy}'; unblock that task instead`,
        { taskId, blockedBy: task.blockedBy }
      );
    }

    const now = this.now();
    const changes: Changes = new Map();
    changes.set(taskId, {
      ...task,
      status: 'pending',
      retryCount: 0,
      blockedReason: undefined,
      updatedAt: now,
    });
    this.releaseDependents(taskId, changes, now);
    this.commit(changes);

    log.info('Task unblocked', { sessionId: this.sessionId, taskId, released: changes.size - 1 });
    return this.require(taskId);
  }

  /**
   * Mark a pending or blocked task completed by explicit human decision
   */
  overrideComplete(taskId: string, note: string): Task {
    const task = this.require(taskId);
    if (task.status !== 'pending' && task.status !== 'blocked') {
      throw new InvalidTransitionError(`Task '${taskId}' is ${task.status}; only pending or blocked tasks can be overridden`, {
        taskId,
        status: task.status,
      });
    }
    if (task.blockedBy !== undefined) {
      throw new InvalidTransitionError(
        `Task '${taskId}' is blocked by '${task.blockedBy}'; resolve that task instead`,
        { taskId, blockedBy: task.blockedBy }
      );
    }

    const now = this.now();
    const changes: Changes = new Map();
    changes.set(taskId, {
      ...task,
      status: 'completed',
      result: note,
      blockedReason: undefined,
      completedAt: now,
      updatedAt: now,
    });
    if (task.status === 'blocked') {
      this.releaseDependents(taskId, changes, now);
    }
    this.commit(changes);

    log.warn('Task completed by override', { sessionId: this.sessionId, taskId });
    return this.require(taskId);
  }

  // ==================== Structure edits ====================

  /**
   * Make a pending task wait for another task
   */
  addDependency(taskId: string, dependsOnId: string): Task {
    const task = this.require(taskId);
    const dependency = this.require(dependsOnId);

    if (task.status !== 'pending') {
      throw new InvalidTransitionError(`Task '${taskId}' is ${task.status}; dependencies can only be added to pending tasks`, {
        taskId,
        status: task.status,
      });
    }
    if (task.dependencies.includes(dependsOnId)) {
      return task;
    }

    const cycle = findCycle([taskId], id => (id === taskId ? [dependsOnId] : this.tasks.get(id)?.dependencies ?? []));
    if (cycle) {
      throw new CyclicDependencyError(taskId, cycle);
    }

    const now = this.now();
    const changes: Changes = new Map();
    changes.set(taskId, { ...task, dependencies: [...task.dependencies, dependsOnId], updatedAt: now });
    if (dependency.status === 'blocked') {
      this.propagateBlock(dependsOnId, dependency.blockedBy ?? dependsOnId, changes, now);
    }
    this.commit(changes);

    return this.require(taskId);
  }

  /**
   * Edit the description, owning role or priority of a pending task
   */
  updateTask(taskId: string, update: TaskUpdate): Task {
    const task = this.require(taskId);
    if (task.status !== 'pending') {
      throw new InvalidTransitionError(`Task '${taskId}' is ${task.status}; only pending tasks can be edited`, {
        taskId,
        status: task.status,
      });
    }

    const updated: Task = {
      ...task,
      description: update.description ?? task.description,
      role: update.role ?? task.role,
      priority: update.priority ?? task.priority,
      updatedAt: this.now(),
    };
    const saved = this.save(updated);
    log.info('Task updated', { sessionId: this.sessionId, taskId, fields: Object.keys(update) });
    return saved;
  }

  /**
   * Delete a pending or blocked task that no other task depends on
   */
  removeTask(taskId: string): void {
    const task = this.require(taskId);
    if (task.status === 'in_progress' || task.status === 'completed') {
      throw new InvalidTransitionError(`Task '${taskId}' is ${task.status} and cannot be removed`, {
        taskId,
        status: task.status,
      });
    }

    const dependents = this.dependentsOf(taskId, new Map()).map(t => t.id);
    if (dependents.length > 0) {
      throw new InvalidTransitionError(`Task '${taskId}' is a dependency of ${dependents.join(', ')}`, {
        taskId,
        dependents,
      });
    }

    this.store.deleteTask(this.sessionId, taskId);
    this.tasks.delete(taskId);
    log.info('Task removed', { sessionId: this.sessionId, taskId });
  }

  // ==================== Internals ====================

  private dependenciesMet(task: Task): boolean {
    return task.dependencies.every(id => this.tasks.get(id)?.status === 'completed');
  }

  private assertTransition(task: Task, to: TaskStatus): void {
    if (!TASK_STATUS_TRANSITIONS[task.status].includes(to)) {
      throw new InvalidTransitionError(`Task '${task.id}' cannot move from ${task.status} to ${to}`, {
        taskId: task.id,
        from: task.status,
        to,
      });
    }
  }

  private view(id: string, changes: Changes): Task | undefined {
    return changes.get(id) ?? this.tasks.get(id);
  }

  private dependentsOf(id: string, changes: Changes): Task[] {
    const ids = new Set([...this.tasks.keys(), ...changes.keys()]);
    const dependents: Task[] = [];
    for (const candidate of ids) {
      const task = this.view(candidate, changes);
      if (task?.dependencies.includes(id)) {
        dependents.push(task);
      }
    }
    return dependents;
  }

  /**
   * Dependency id to the ids of the tasks waiting on it
   */
  private dependentIndex(changes: Changes): Map<string, string[]> {
    const index = new Map<string, string[]>();
    for (const id of new Set([...this.tasks.keys(), ...changes.keys()])) {
      for (const depId of this.view(id, changes)?.dependencies ?? []) {
        const list = index.get(depId);
        if (list) {
          list.push(id);
        } else {
          index.set(depId, [id]);
        }
      }
    }
    return index;
  }

  /**
   * Block every unfinished task downstream of `fromId`, recording `rootId`
   * as the task that has to be resolved
   */
  private propagateBlock(
    fromId: string,
    rootId: string,
    changes: Changes,
    now: Date,
    dependents: Map<string, string[]> = this.dependentIndex(changes)
  ): void {
    const queue = [fromId];
    for (let head = 0; head < queue.length; head++) {
      for (const dependentId of dependents.get(queue[head]) ?? []) {
        const dependent = this.view(dependentId, changes);
        if (!dependent || dependent.status === 'completed' || dependent.status === 'blocked') {
          continue;
        }
        changes.set(dependent.id, {
          ...dependent,
          status: 'blocked',
          blockedReason: `Dependency '${rootId}' is blocked`,
          blockedBy: rootId,
          assignedAgentId: undefined,
          updatedAt: now,
        });
        queue.push(dependent.id);
      }
    }
  }

  /**
   * Return tasks blocked because of `rootId` to pending, then re-apply any
   * other block that still reaches them
   */
  private releaseDependents(rootId: string, changes: Changes, now: Date): void {
    for (const task of this.tasks.values()) {
      if (task.status === 'blocked' && task.blockedBy === rootId) {
        changes.set(task.id, {
          ...task,
          status: 'pending',
          blockedReason: undefined,
          blockedBy: undefined,
          updatedAt: now,
        });
      }
    }

    const dependents = this.dependentIndex(changes);
    for (const task of this.tasks.values()) {
      const current = this.view(task.id, changes);
      if (current?.status === 'blocked' && current.blockedBy === undefined) {
        this.propagateBlock(current.id, current.id, changes, now, dependents);
      }
    }
  }

  private save(task: Task): Task {
    this.commit(new Map([[task.id, task]]));
    return cloneTask(task);
  }

  private commit(changes: Changes): void {
    const updated = [...changes.values()];
    this.store.transaction(() => {
      for (const task of updated) {
        this.store.upsertTask(task);
      }
    });

    for (const task of updated) {
      this.tasks.set(task.id, task);
      this.nextSequence = Math.max(this.nextSequence, task.sequence + 1);
    }
  }
}

/**
 * Depth-first search for a dependency cycle reachable from `roots`. Returns
 * the cycle, starting and ending at the task it re-enters, or null.
 */
export function findCycle(roots: Iterable<string>, edges: (id: string) => string[]): string[] | null {
  const finished = new Set<string>();
  const onPath = new Map<string, number>();

  for (const root of roots) {
    if (finished.has(root)) {
      continue;
    }

    const stack: Array<{ id: string; deps: string[]; next: number }> = [{ id: root, deps: edges(root), next: 0 }];
    onPath.set(root, 0);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.next >= frame.deps.length) {
        stack.pop();
        onPath.delete(frame.id);
        finished.add(frame.id);
        continue;
      }

      const dep = frame.deps[frame.next++];
      const depth = onPath.get(dep);
      if (depth !== undefined) {
        return [...stack.slice(depth).map(f => f.id), dep];
      }
      if (!finished.has(dep)) {
        onPath.set(dep, stack.length);
        stack.push({ id: dep, deps: edges(dep), next: 0 });
      }
    }
  }

  return null;
}
