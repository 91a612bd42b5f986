/**
 * Session coordinator tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SessionCoordinator, type SessionCoordinatorOptions } from '../../src/coordination/session-coordinator.js';
import { MessageBus, coordinatorAddress } from '../../src/coordination/message-bus.js';
import { InvalidTransitionError, NotFoundError } from '../../src/utils/errors.js';
import type { Assignment, Completion, TaskDraft } from '../../src/types.js';
import { createClock, createTempStore, testConfig, type TempStore, type TestClock } from '../helpers.js';

const GOAL = 'Build a todo app';

describe('SessionCoordinator', () => {
  let temp: TempStore;
  let clock: TestClock;
  let bus: MessageBus;
  let assignments: Assignment[];
  let coordinator: SessionCoordinator;

  function start(options: SessionCoordinatorOptions = {}): SessionCoordinator {
    coordinator = SessionCoordinator.start(temp.store, GOAL, {
      config: testConfig(),
      bus,
      now: clock.now,
      ...options,
    });
    coordinator.on('task:assigned', (assignment: Assignment) => assignments.push(assignment));
    return coordinator;
  }

  async function complete(taskId: string, overrides: Partial<Completion> = {}): Promise<void> {
    bus.send({
      from: 'worker',
      to: coordinatorAddress(coordinator.sessionId),
      type: 'task:result',
      payload: { taskId, outcome: 'success', artifactSummary: `${taskId} done`, ...overrides },
    });
    await coordinator.settled();
  }

  async function plan(drafts: TaskDraft[]): Promise<void> {
    await coordinator.tick();
    await complete('planning', { tasks: drafts });
  }

  function status(taskId: string): string {
    return coordinator.graph.require(taskId).status;
  }

  function reportKinds(): unknown[] {
    return temp.store.listReports(coordinator.sessionId).map(r => r.payload.kind);
  }

  beforeEach(() => {
    temp = createTempStore();
    clock = createClock();
    bus = new MessageBus();
    assignments = [];
  });

  afterEach(async () => {
    await coordinator?.close();
    temp.cleanup();
  });

  describe('start', () => {
    it('should seed the session with the planning task', () => {
      start();

      expect(coordinator.phase).toBe('planning');
      expect(coordinator.runStatus).toBe('running');
      expect(coordinator.graph.list()).toHaveLength(1);
      expect(coordinator.graph.require('planning')).toMatchObject({
        role: 'planner',
        description: GOAL,
        priority: 10,
        status: 'pending',
      });
    });

    it('should refuse an empty goal', () => {
      expect(() => SessionCoordinator.start(temp.store, '  ', { config: testConfig(), bus })).toThrow(RangeError);
      expect(temp.store.listSessions()).toEqual([]);
    });

    it('should fail with NotFound when resuming an unknown session', () => {
      expect(() =>
        SessionCoordinator.resume(temp.store, '20260101_000000_000_abcd', { config: testConfig(), bus })
      ).toThrow(NotFoundError);
    });
  });

  describe('dispatch', () => {
    it('should hand the planning task to a planner first', async () => {
      start();

      const result = await coordinator.tick();

      expect(result).toEqual({ phase: 'planning', assigned: ['planning'], transitions: [] });
      expect(assignments).toEqual([
        {
          sessionId: coordinator.sessionId,
          agentId: 'planner_001',
          role: 'planner',
          taskId: 'planning',
          description: GOAL,
          dependencyContext: [],
          feedback: [],
          attempt: 1,
          redelivery: false,
        },
      ]);
    });

    it('should hold builder work back while planning', async () => {
      start();

      await coordinator.addTasks([{ id: 'T1', role: 'builder', description: 'Scaffold project' }]);

      expect(status('planning')).toBe('in_progress');
      expect(status('T1')).toBe('pending');
    });

    it('should advance to implementation once the plan is accepted', async () => {
      start();
      const phases = vi.fn();
      const retired = vi.fn();
      coordinator.on('phase:changed', phases);
      coordinator.on('agent:retired', retired);

      await plan([
        { id: 'T1', role: 'builder', description: 'Implement login' },
        { id: 'T2', role: 'builder', description: 'Add sessions', dependencies: ['T1'] },
      ]);

      expect(coordinator.phase).toBe('implementation');
      expect(phases).toHaveBeenCalledWith('planning', 'implementation');
      expect(retired.mock.calls.map(([agent]) => agent.id)).toEqual(['planner_001']);
      expect(coordinator.graph.require('T1')).toMatchObject({ status: 'in_progress', assignedAgentId: 'builder_001' });
      expect(status('T2')).toBe('pending');
      expect(reportKinds()).toEqual(['phase']);
    });

    it('should keep in-flight work per role under the configured limit', async () => {
      start({ config: testConfig({ coordinator: { maxInFlightPerRole: 1 } }) });

      await plan([
        { id: 'T1', role: 'builder', description: 'one' },
        { id: 'T2', role: 'builder', description: 'two' },
      ]);
      expect(coordinator.graph.list({ status: 'in_progress' }).map(t => t.id)).toEqual(['T1']);

      await complete('T1');
      expect(coordinator.graph.list({ status: 'in_progress' }).map(t => t.id)).toEqual(['T2']);
    });

    it('should dispatch added tasks straight away', async () => {
      start();
      await plan([{ id: 'T1', role: 'builder', description: 'one' }]);

      const [added] = await coordinator.addTasks([{ id: 'T9', role: 'builder', description: 'late addition' }]);

      expect(added?.status).toBe('pending');
      expect(status('T9')).toBe('in_progress');
    });

    it('should import a task list with aliased fields', async () => {
      start();
      await plan([{ id: 'T1', role: 'builder', description: 'one' }]);

      const imported = await coordinator.importTasks('[{"task_id": 7, "subject": "Write docs", "owner": "documenter"}]');

      expect(imported.map(t => [t.id, t.role, t.description])).toEqual([['7', 'documenter', 'Write docs']]);
      expect(status('7')).toBe('pending');
    });
  });

  describe('completions', () => {
    it('should send rejected work back with its feedback', async () => {
      start();
      const rejected = vi.fn();
      coordinator.on('task:rejected', rejected);
      await plan([{ id: 'T1', role: 'builder', description: 'Implement login' }]);

      await complete('T1', { outcome: 'failure', artifactSummary: 'tests crashed' });

      expect(rejected).toHaveBeenCalledTimes(1);
      expect(rejected.mock.calls[0]?.[1]).toEqual({
        verdict: 'rejected',
        feedback: 'tests crashed',
        attempt: 1,
        escalated: false,
      });
      expect(coordinator.graph.require('T1')).toMatchObject({ status: 'in_progress', retryCount: 1 });
      expect(assignments.at(-1)).toMatchObject({ taskId: 'T1', attempt: 2, feedback: ['tests crashed'] });
    });

    it('should commit a duplicated completion only once', async () => {
      start();
      const accepted = vi.fn();
      const done = vi.fn();
      await plan([{ id: 'T1', role: 'builder', description: 'Implement login' }]);
      coordinator.on('task:accepted', accepted);
      coordinator.on('session:done', done);

      const message = {
        from: 'worker',
        to: coordinatorAddress(coordinator.sessionId),
        type: 'task:result' as const,
        payload: { taskId: 'T1', outcome: 'success', artifactSummary: 'login' },
      };
      bus.send(message);
      bus.send(message);
      await coordinator.settled();

      expect(accepted).toHaveBeenCalledTimes(1);
      expect(status('T1')).toBe('completed');
      expect(coordinator.phase).toBe('done');
      expect(done).toHaveBeenCalledTimes(1);
      expect(reportKinds().at(-1)).toBe('final');
    });

    it('should ignore malformed completions', async () => {
      start();
      await plan([{ id: 'T1', role: 'builder', description: 'Implement login' }]);
      const rejected = vi.fn();
      coordinator.on('task:rejected', rejected);

      bus.send({
        from: 'worker',
        to: coordinatorAddress(coordinator.sessionId),
        type: 'task:result',
        payload: { taskId: 'T1', outcome: 'maybe' },
      });
      await coordinator.settled();

      expect(status('T1')).toBe('in_progress');
      expect(rejected).not.toHaveBeenCalled();
    });

    it('should ignore completions for tasks that are not in progress', async () => {
      start();
      await plan([
        { id: 'T1', role: 'builder', description: 'one' },
        { id: 'T2', role: 'builder', description: 'two', dependencies: ['T1'] },
      ]);

      await complete('T2');

      expect(status('T2')).toBe('pending');
    });
  });

  describe('escalation', () => {
    beforeEach(async () => {
      start({
        config: testConfig({ quality: { maxRetries: 2 } }),
        predicates: { builder: () => ({ accepted: false, feedback: 'no' }) },
      });
      await plan([
        { id: 'T1', role: 'builder', description: 'Implement login' },
        { id: 'T2', role: 'builder', description: 'Add sessions', dependencies: ['T1'] },
      ]);
    });

    it('should block the task and its dependents after the last retry', async () => {
      const escalated = vi.fn();
      coordinator.on('task:escalated', escalated);

      await complete('T1');
      expect(status('T1')).toBe('in_progress');

      await complete('T1');

      expect(coordinator.graph.require('T1')).toMatchObject({
        status: 'blocked',
        retryCount: 2,
        blockedReason: 'Rejected 2 times; last feedback: no',
      });
      expect(coordinator.graph.require('T2')).toMatchObject({ status: 'blocked', blockedBy: 'T1' });
      expect(escalated).toHaveBeenCalledTimes(1);
      expect(escalated.mock.calls[0]?.[0].map((t: { id: string }) => t.id)).toEqual(['T1', 'T2']);
      expect(coordinator.phase).toBe('implementation');
      expect(reportKinds()).toEqual(['phase', 'escalation']);
    });

    it('should not escalate the same block twice', async () => {
      const escalated = vi.fn();
      coordinator.on('task:escalated', escalated);
      await complete('T1');
      await complete('T1');

      await coordinator.tick();

      expect(escalated).toHaveBeenCalledTimes(1);
    });

    it('should not escalate a block again after a restart', async () => {
      await complete('T1');
      await complete('T1');
      await coordinator.close();

      coordinator = SessionCoordinator.resume(temp.store, coordinator.sessionId, {
        config: testConfig({ quality: { maxRetries: 2 } }),
        bus,
        now: clock.now,
      });
      const escalated = vi.fn();
      coordinator.on('task:escalated', escalated);

      await coordinator.resume();
      await coordinator.tick();
      await coordinator.tick();

      expect(escalated).not.toHaveBeenCalled();
      expect(reportKinds()).toEqual(['phase', 'escalation', 'resume']);
      expect(status('T1')).toBe('blocked');
    });

    it('should retry a task a human unblocks', async () => {
      await complete('T1');
      await complete('T1');

      const unblocked = await coordinator.unblockTask('T1');

      expect(unblocked).toMatchObject({ status: 'pending', retryCount: 0 });
      expect(status('T1')).toBe('in_progress');
      expect(status('T2')).toBe('pending');
    });

    it('should release dependents of a task a human completes', async () => {
      const accepted = vi.fn();
      coordinator.on('task:accepted', accepted);
      await complete('T1');
      await complete('T1');

      await coordinator.overrideTask('T1', 'checked by hand');

      expect(coordinator.graph.require('T1')).toMatchObject({ status: 'completed', result: 'checked by hand' });
      expect(accepted).toHaveBeenCalledTimes(1);
      expect(status('T2')).toBe('in_progress');
    });
  });

  describe('task edits', () => {
    it('should hand an edited task to its new role', async () => {
      start();
      await coordinator.tick();
      await coordinator.pause();
      await complete('planning', {
        tasks: [
          { id: 'T1', role: 'builder', description: 'Implement login' },
          { id: 'T2', role: 'builder', description: 'Write docs', dependencies: ['T1'] },
        ],
      });

      const edited = await coordinator.updateTask('T2', { role: 'documenter', description: 'Document login' });
      expect(edited).toMatchObject({ id: 'T2', role: 'documenter', description: 'Document login', status: 'pending' });

      await coordinator.resume();
      await complete('T1');

      expect(assignments.at(-1)).toMatchObject({ taskId: 'T2', role: 'documenter', description: 'Document login' });
    });

    it('should refuse edits to work that has started', async () => {
      start();
      await coordinator.tick();

      await expect(coordinator.updateTask('planning', { description: 'other goal' })).rejects.toThrow(
        InvalidTransitionError
      );
    });

    it('should refuse an empty or invalid update', async () => {
      start();

      await expect(coordinator.updateTask('planning', {})).rejects.toThrow(RangeError);
      await expect(coordinator.updateTask('planning', { priority: -1 })).rejects.toThrow(RangeError);
    });
  });

  describe('pause and resume', () => {
    it('should stop dispatching while paused', async () => {
      start();
      const paused = vi.fn();
      coordinator.on('session:paused', paused);
      await coordinator.tick();

      const session = await coordinator.pause('waiting for review');

      expect(session.runStatus).toBe('paused');
      expect(paused).toHaveBeenCalledWith(expect.objectContaining({ runStatus: 'paused' }), 'waiting for review');
      const [report] = temp.store.listReports(coordinator.sessionId);
      expect(report?.payload.kind).toBe('pause');
      expect(report?.payload.reason).toBe('waiting for review');

      await complete('planning', { tasks: [{ id: 'T1', role: 'builder', description: 'one' }] });

      expect(status('planning')).toBe('completed');
      expect(coordinator.phase).toBe('planning');
      expect(status('T1')).toBe('pending');
      expect(await coordinator.tick()).toEqual({ phase: 'planning', assigned: [], transitions: [] });
    });

    it('should continue in the phase it stopped in', async () => {
      start();
      await coordinator.tick();
      await coordinator.pause();
      await complete('planning', { tasks: [{ id: 'T1', role: 'builder', description: 'one' }] });

      const result = await coordinator.resume();

      expect(result).toEqual({ phase: 'implementation', assigned: ['T1'], transitions: ['implementation'] });
      expect(coordinator.runStatus).toBe('running');
      expect(reportKinds()).toEqual(['pause', 'resume', 'phase']);
    });

    it('should pause only once', async () => {
      start();
      await coordinator.pause();
      await coordinator.pause();

      expect(reportKinds()).toEqual(['pause']);
    });
  });

  describe('restart', () => {
    async function restart(options: SessionCoordinatorOptions = {}): Promise<SessionCoordinator> {
      start();
      await coordinator.tick();
      await coordinator.close();

      coordinator = SessionCoordinator.resume(temp.store, coordinator.sessionId, {
        config: testConfig(),
        bus,
        now: clock.now,
        ...options,
      });
      assignments = [];
      coordinator.on('task:assigned', (assignment: Assignment) => assignments.push(assignment));
      return coordinator;
    }

    it('should redeliver in-progress work to its agent', async () => {
      await restart();

      const result = await coordinator.resume();

      expect(result.assigned).toEqual([]);
      expect(assignments).toHaveLength(1);
      expect(assignments[0]).toMatchObject({ taskId: 'planning', agentId: 'planner_001', redelivery: true });
      expect(reportKinds()).toEqual(['resume']);
    });

    it('should redeliver only once', async () => {
      await restart();

      await coordinator.tick();
      await coordinator.tick();

      expect(assignments).toHaveLength(1);
    });

    it('should requeue in-progress work when redelivery is off', async () => {
      await restart({ config: testConfig({ coordinator: { redeliverOnResume: false } }) });

      const result = await coordinator.tick();

      expect(result.assigned).toEqual(['planning']);
      expect(assignments[0]).toMatchObject({ taskId: 'planning', agentId: 'planner_001', redelivery: false });
    });

    it('should accept completions after the restart', async () => {
      await restart();
      await coordinator.resume();

      await complete('planning', { tasks: [{ id: 'T1', role: 'builder', description: 'one' }] });

      expect(coordinator.phase).toBe('implementation');
      expect(status('T1')).toBe('in_progress');
    });
  });

  describe('reports', () => {
    it('should append a manual report with the current summary', async () => {
      start();
      await coordinator.tick();

      const report = await coordinator.report();

      expect(report.phase).toBe('planning');
      expect(report.completedCount).toBe(0);
      expect(report.payload.kind).toBe('manual');
      expect(report.payload.goal).toBe(GOAL);
      expect(report.payload.activeAgents).toEqual(['planner_001']);
    });

    it('should summarize the session', async () => {
      start();
      await plan([{ id: 'T1', role: 'builder', description: 'one' }]);

      const summary = coordinator.summary();

      expect(summary.phase).toBe('implementation');
      expect(summary.completedTasks).toEqual(['planning']);
      expect(summary.activeAgents).toEqual(['builder_001']);
    });

    it('should snapshot everything stored for the session', async () => {
      start();
      await coordinator.tick();

      const snapshot = coordinator.snapshot();

      expect(snapshot.session.id).toBe(coordinator.sessionId);
      expect(snapshot.agents.map(a => a.id)).toEqual(['planner_001']);
      expect(snapshot.tasks.map(t => t.id)).toEqual(['planning']);
      expect(snapshot.reports).toEqual([]);
    });
  });
});
