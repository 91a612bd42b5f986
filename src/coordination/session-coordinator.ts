/**
 * Session coordinator - drives one session through its phases
 *
 * Every mutation of the session (task status, agent lifecycle, phase) runs
 * inside the session's semaphore. Quality predicates are awaited outside of
 * it; their decision is committed afterwards only if the task has not moved
 * on in the meantime, which makes duplicate completions harmless.
 */

import { EventEmitter } from 'node:events';
import type {
  Agent,
  Assignment,
  AutocrewConfig,
  Completion,
  Phase,
  QualityPredicate,
  Report,
  ReportKind,
  Role,
  RunStatus,
  Session,
  Task,
  TaskDraft,
} from '../types.js';
import type { SQLiteStore } from '../store/sqlite-store.js';
import { TaskGraph, type TaskUpdate } from '../tasks/task-graph.js';
import { parseTaskList, type TaskListImportOptions } from '../tasks/task-import.js';
import { AgentRegistry } from '../agents/agent-registry.js';
import { Reporter, type SessionSnapshot, type SessionSummary } from '../reporting/reporter.js';
import { getConfig } from '../utils/config.js';
import { isCoordinatorError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { Semaphore } from '../utils/semaphore.js';
import { CompletionSchema, TaskUpdateSchema, validate } from '../utils/validation.js';
import { QualityGate, type GateDecision, type ValidationRejected } from './quality-gate.js';
import { coordinatorAddress, getMessageBus, workerAddress, type Message, type MessageBus } from './message-bus.js';
import { expectedRoles, isPhaseComplete, nextPhase } from './phases.js';

const log = logger.child('coordinator');

export const PLANNING_TASK_ID = 'planning';
export const PLANNING_TASK_PRIORITY = 10;

export interface SessionCoordinatorOptions {
  config?: AutocrewConfig;
  bus?: MessageBus;
  predicates?: Partial<Record<Role, QualityPredicate>>;
  now?: () => Date;
}

export interface TickResult {
  phase: Phase;
  /** Tasks handed to agents during the tick */
  assigned: string[];
  /** Phases entered during the tick, in order */
  transitions: Phase[];
}

export interface SessionCoordinatorEvents {
  'phase:changed': (from: Phase, to: Phase) => void;
  'task:assigned': (assignment: Assignment) => void;
  'task:accepted': (task: Task) => void;
  'task:rejected': (task: Task, rejection: ValidationRejected) => void;
  'task:escalated': (blocked: Task[]) => void;
  'agent:spawned': (agent: Agent) => void;
  'agent:retired': (agent: Agent) => void;
  'session:paused': (session: Session, reason?: string) => void;
  'session:resumed': (session: Session) => void;
  'session:done': (session: Session) => void;
  'report:created': (report: Report) => void;
  'error': (error: Error) => void;
}

/**
 * Marks one attempt at a task; a completion is only committed against the
 * attempt it was reviewed for
 */
function attemptKey(task: Task): string {
  return `${task.retryCount}:${task.startedAt?.getTime() ?? ''}`;
}

export class SessionCoordinator extends EventEmitter {
  readonly sessionId: string;
  readonly graph: TaskGraph;
  readonly registry: AgentRegistry;
  readonly gate: QualityGate;
  readonly reporter: Reporter;

  private session: Session;
  private readonly store: SQLiteStore;
  private readonly bus: MessageBus;
  private readonly config: AutocrewConfig;
  private readonly now: () => Date;
  private readonly mutex: Semaphore;
  private readonly inflight: Set<Promise<void>> = new Set();
  private readonly escalated: Set<string> = new Set();
  private needsRedelivery: boolean;
  private unsubscribe: (() => void) | null;

  /**
   * Create a session for `goal` together with the planning task that
   * opens it
   */
  static start(store: SQLiteStore, goal: string, options: SessionCoordinatorOptions = {}): SessionCoordinator {
    if (goal.trim() === '') {
      throw new RangeError('A session needs a goal');
    }

    const now = options.now ?? (() => new Date());
    const session = store.transaction(() => {
      const created = store.createSession(goal, now());
      new TaskGraph(store, created.id, { now }).addTask({
        id: PLANNING_TASK_ID,
        role: 'planner',
        description: goal,
        priority: PLANNING_TASK_PRIORITY,
      });
      return created;
    });

    log.info('Session started', { sessionId: session.id });
    return new SessionCoordinator(store, session, options, false);
  }

  /**
   * Rebuild a coordinator for an existing session purely from the store.
   * Unknown ids fail with NotFound; no session is created.
   */
  static resume(store: SQLiteStore, sessionId: string, options: SessionCoordinatorOptions = {}): SessionCoordinator {
    const session = store.loadSession(sessionId);
    log.info('Session restored', { sessionId, phase: session.phase, runStatus: session.runStatus });
    return new SessionCoordinator(store, session, options, true);
  }

  private constructor(
    store: SQLiteStore,
    session: Session,
    options: SessionCoordinatorOptions,
    restored: boolean
  ) {
    super();
    this.store = store;
    this.session = session;
    this.sessionId = session.id;
    this.config = options.config ?? getConfig();
    this.bus = options.bus ?? getMessageBus();
    this.now = options.now ?? (() => new Date());
    this.mutex = new Semaphore(`session:${session.id}`);

    this.graph = new TaskGraph(store, session.id, { now: this.now });
    this.registry = new AgentRegistry(store, session.id, { now: this.now });
    this.gate = new QualityGate(this.graph, {
      maxRetries: this.config.quality.maxRetries,
      predicates: options.predicates,
    });
    this.reporter = new Reporter(store, { staleAfterMs: this.config.coordinator.staleAfterMs });

    this.needsRedelivery = restored;
    if (restored) {
      this.restoreEscalations();
    }
    this.unsubscribe = this.bus.subscribe(coordinatorAddress(session.id), message => this.onMessage(message));
  }

  get phase(): Phase {
    return this.session.phase;
  }

  get runStatus(): RunStatus {
    return this.session.runStatus;
  }

  getSession(): Session {
    return { ...this.session };
  }

  // ==================== Dispatch ====================

  /**
   * Run one dispatch iteration: assign ready work, then advance through
   * every phase that is finished
   */
  async tick(): Promise<TickResult> {
    return this.mutex.execute(() => this.step());
  }

  private step(): TickResult {
    const result: TickResult = { phase: this.session.phase, assigned: [], transitions: [] };
    if (this.session.runStatus === 'paused') {
      return result;
    }

    if (this.needsRedelivery) {
      this.redeliver();
      this.needsRedelivery = false;
    }
    this.escalateBlocked();

    for (;;) {
      const roles = expectedRoles(this.session.phase, this.graph.list());
      for (const role of roles) {
        result.assigned.push(...this.dispatch(role));
      }

      if (!isPhaseComplete(this.session.phase, this.graph.list())) break;
      const next = nextPhase(this.session.phase);
      if (!next) break;

      this.advance(next);
      result.transitions.push(next);
    }

    result.phase = this.session.phase;
    return result;
  }

  private dispatch(role: Role): string[] {
    const ready = this.graph.readyTasks(role);
    const running = this.graph.list({ role, status: 'in_progress' }).length;
    const capacity = this.config.coordinator.maxInFlightPerRole - running;
    if (ready.length === 0 || capacity <= 0) {
      return [];
    }

    const agent = this.ensureAgent(role);
    return ready.slice(0, capacity).map(task => {
      this.graph.markInProgress(task.id, agent.id);
      this.deliver(task.id, agent, false);
      return task.id;
    });
  }

  private ensureAgent(role: Role): Agent {
    const current = this.registry.activeFor(role);
    if (current) {
      return current;
    }
    const agent = this.registry.spawn(role);
    this.emit('agent:spawned', agent);
    return agent;
  }

  private deliver(taskId: string, agent: Agent, redelivery: boolean): void {
    const task = this.graph.require(taskId);
    const assignment: Assignment = {
      sessionId: this.sessionId,
      agentId: agent.id,
      role: task.role,
      taskId: task.id,
      description: task.description,
      dependencyContext: this.graph.dependencyContext(task.id),
      feedback: task.feedback.map(f => f.feedback),
      attempt: task.retryCount + 1,
      redelivery,
    };

    log.info('Task assigned', { sessionId: this.sessionId, taskId, agentId: agent.id, redelivery });
    this.emit('task:assigned', assignment);
    this.bus.send({
      from: coordinatorAddress(this.sessionId),
      to: workerAddress(this.sessionId),
      type: 'task:assign',
      payload: assignment,
    });
  }

  /**
   * Hand in-progress work of a restored session back to agents. With
   * redelivery disabled the work is requeued instead.
   */
  private redeliver(): void {
    for (const task of this.graph.list({ status: 'in_progress' })) {
      if (!this.config.coordinator.redeliverOnResume) {
        this.graph.requeue(task.id);
        continue;
      }

      let agent = task.assignedAgentId ? this.registry.get(task.assignedAgentId) : null;
      if (!agent || agent.status !== 'active') {
        agent = this.ensureAgent(task.role);
        this.graph.reassign(task.id, agent.id);
      }
      this.deliver(task.id, agent, true);
    }
  }

  private advance(next: Phase): void {
    const from = this.session.phase;
    const tasks = this.graph.list();
    const keep = new Set(expectedRoles(next, tasks));
    for (const task of tasks) {
      if (task.status === 'in_progress') keep.add(task.role);
    }

    for (const agent of this.registry.retireAllExcept(keep)) {
      this.emit('agent:retired', agent);
    }

    this.session = this.store.updateSession(this.sessionId, { phase: next }, this.now());
    log.info('Phase changed', { sessionId: this.sessionId, from, to: next });

    this.appendReport(next === 'done' ? 'final' : 'phase', { from, to: next });
    this.emit('phase:changed', from, next);
    if (next === 'done') {
      this.emit('session:done', this.getSession());
    }
  }

  // ==================== Completions ====================

  private onMessage(message: Message): void {
    if (message.type !== 'task:result') {
      return;
    }
    if (!this.unsubscribe) {
      log.debug('Ignoring completion after close', { sessionId: this.sessionId });
      return;
    }

    const parsed = CompletionSchema.safeParse(message.payload);
    if (!parsed.success) {
      log.warn('Ignoring malformed completion', {
        sessionId: this.sessionId,
        from: message.from,
        issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
      });
      return;
    }

    this.track(this.handleCompletion(parsed.data));
  }

  private track(work: Promise<void>): void {
    const tracked = work.catch((error: unknown) => {
      const err = error instanceof Error ? error : new Error(String(error));
      if (this.listenerCount('error') > 0) {
        this.emit('error', err);
      } else {
        log.error('Completion handling failed', { sessionId: this.sessionId, error: err });
      }
    });
    this.inflight.add(tracked);
    void tracked.finally(() => this.inflight.delete(tracked));
  }

  private async handleCompletion(completion: Completion): Promise<void> {
    const task = this.graph.get(completion.taskId);
    if (!task || task.status !== 'in_progress') {
      log.debug('Ignoring completion for task not in progress', {
        sessionId: this.sessionId,
        taskId: completion.taskId,
        status: task?.status,
      });
      return;
    }

    const attempt = attemptKey(task);
    const decision = await this.gate.review(task.id, completion);

    await this.mutex.execute(() => {
      const current = this.graph.get(task.id);
      if (!current || current.status !== 'in_progress' || attemptKey(current) !== attempt) {
        log.debug('Discarding completion for a finished attempt', { sessionId: this.sessionId, taskId: task.id });
        return;
      }

      this.commitDecision(current, decision);
      this.step();
    });
  }

  private commitDecision(task: Task, decision: GateDecision): void {
    let rejection: ValidationRejected;

    if (decision.verdict === 'accepted') {
      try {
        const completed = this.graph.commitAcceptance(decision.token, decision.drafts);
        this.emit('task:accepted', completed);
        return;
      } catch (error) {
        if (!isCoordinatorError(error)) {
          throw error;
        }
        rejection = this.gate.reject(task, `Completion could not be recorded: ${error.message}`);
      }
    } else {
      rejection = decision;
    }

    const updated = this.graph.recordRejection(task.id, rejection.feedback, rejection.escalated);
    this.emit('task:rejected', updated, rejection);

    if (rejection.escalated) {
      this.escalate(task.id);
    }
  }

  // ==================== Escalation ====================

  private escalateBlocked(): void {
    for (const task of this.graph.list({ status: 'blocked' })) {
      if (task.blockedBy === undefined && !this.escalated.has(task.id)) {
        this.escalate(task.id);
      }
    }
  }

  /**
   * Blocks that were escalated before a restart stay escalated. An
   * escalation counts for a block when it was reported after the task was
   * blocked; blocked tasks are not modified until they are resolved.
   */
  private restoreEscalations(): void {
    const roots = new Map(
      this.graph
        .list({ status: 'blocked' })
        .filter(t => t.blockedBy === undefined)
        .map(t => [t.id, t])
    );

    for (const report of this.store.listReports(this.sessionId)) {
      const taskId = report.payload.taskId;
      if (report.payload.kind !== 'escalation' || typeof taskId !== 'string') continue;

      const root = roots.get(taskId);
      if (root && report.timestamp.getTime() >= root.updatedAt.getTime()) {
        this.escalated.add(taskId);
      }
    }
  }

  private escalate(rootId: string): void {
    const affected = this.graph.list({ status: 'blocked' }).filter(t => t.id === rootId || t.blockedBy === rootId);
    this.escalated.add(rootId);

    log.warn('Human input required', {
      sessionId: this.sessionId,
      taskId: rootId,
      affected: affected.map(t => t.id),
    });
    this.emit('task:escalated', affected);
    this.appendReport('escalation', { taskId: rootId });
  }

  // ==================== Session control ====================

  /**
   * Stop dispatching. In-progress tasks stay in progress and their
   * completions are still accepted.
   */
  async pause(reason?: string): Promise<Session> {
    return this.mutex.execute(() => {
      if (this.session.runStatus === 'paused') {
        return this.getSession();
      }

      this.session = this.store.updateSession(this.sessionId, { runStatus: 'paused' }, this.now());
      this.appendReport('pause', reason ? { reason } : {});
      log.info('Session paused', { sessionId: this.sessionId, phase: this.session.phase, reason });
      this.emit('session:paused', this.getSession(), reason);
      return this.getSession();
    });
  }

  /**
   * Continue a paused or restored session in the phase it stopped in
   */
  async resume(): Promise<TickResult> {
    return this.mutex.execute(() => {
      const wasPaused = this.session.runStatus === 'paused';
      if (wasPaused) {
        this.session = this.store.updateSession(this.sessionId, { runStatus: 'running' }, this.now());
      }
      if (wasPaused || this.needsRedelivery) {
        this.appendReport('resume', { redelivery: this.needsRedelivery });
        log.info('Session resumed', { sessionId: this.sessionId, phase: this.session.phase });
        this.emit('session:resumed', this.getSession());
      }
      return this.step();
    });
  }

  async addTasks(drafts: TaskDraft[]): Promise<Task[]> {
    return this.mutex.execute(() => {
      const added = this.graph.addTasks(drafts);
      this.step();
      return added;
    });
  }

  /**
   * Add the tasks of an external task list (JSON text or decoded value)
   */
  async importTasks(input: unknown, options: TaskListImportOptions = {}): Promise<Task[]> {
    return this.addTasks(parseTaskList(input, options));
  }

  /**
   * Edit the description, owning role or priority of a pending task
   */
  async updateTask(taskId: string, update: TaskUpdate): Promise<Task> {
    const parsed = validate(TaskUpdateSchema, update);
    if (!parsed.success) {
      throw new RangeError(`Invalid task update: ${parsed.errors.join('; ')}`);
    }

    return this.mutex.execute(() => {
      const task = this.graph.updateTask(taskId, parsed.data);
      this.step();
      return task;
    });
  }

  /**
   * Human override: give a blocked task a fresh retry budget
   */
  async unblockTask(taskId: string): Promise<Task> {
    return this.mutex.execute(() => {
      const task = this.graph.unblock(taskId);
      this.escalated.delete(taskId);
      this.step();
      return task;
    });
  }

  /**
   * Human override: accept a pending or blocked task as completed
   */
  async overrideTask(taskId: string, note: string): Promise<Task> {
    return this.mutex.execute(() => {
      const task = this.graph.overrideComplete(taskId, note);
      this.escalated.delete(taskId);
      this.emit('task:accepted', task);
      this.step();
      return task;
    });
  }

  // ==================== Reporting ====================

  async report(): Promise<Report> {
    return this.mutex.execute(() => this.appendReport('manual', {}));
  }

  summary(): SessionSummary {
    return this.reporter.summarize(this.sessionId, { now: this.now() });
  }

  snapshot(): SessionSnapshot {
    return this.reporter.snapshot(this.sessionId);
  }

  private appendReport(kind: ReportKind, detail: Record<string, unknown>): Report {
    const summary = this.reporter.summarize(this.sessionId, { now: this.now() });
    const report = this.store.appendReport(this.sessionId, {
      phase: this.session.phase,
      completedCount: summary.completedCount,
      payload: { kind, ...detail, ...summary },
      timestamp: this.now(),
    });

    log.debug('Report created', { sessionId: this.sessionId, kind, reportId: report.id });
    this.emit('report:created', report);
    return report;
  }

  // ==================== Lifecycle ====================

  /**
   * Wait until every received completion has been handled
   */
  async settled(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  /**
   * Stop listening for completions. The store stays open; it belongs to
   * the caller.
   */
  async close(): Promise<void> {
    await this.settled();
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
      log.debug('Coordinator closed', { sessionId: this.sessionId });
    }
  }
}
