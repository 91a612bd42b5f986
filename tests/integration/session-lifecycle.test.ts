/**
 * Integration: a session from goal to done against a project store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SessionCoordinator } from '../../src/coordination/session-coordinator.js';
import { MessageBus } from '../../src/coordination/message-bus.js';
import { openProjectStore, type SQLiteStore } from '../../src/store/index.js';
import { createConfig } from '../../src/utils/config.js';
import type { Completion, QualityPredicate, TaskDraft } from '../../src/types.js';
import { createClock, type TestClock } from '../helpers.js';
import { ScriptedWorkers, createProjectDir, flushAsync, removeProjectDir } from './setup.js';

const PLAN: TaskDraft[] = [
  { id: 'T1', role: 'builder', description: 'Implement login form' },
  { id: 'T2', role: 'builder', description: 'Add session handling', dependencies: ['T1'] },
  { id: 'T3', role: 'builder', description: 'Add password reset', dependencies: ['T1'] },
  { id: 'Q1', role: 'quality_checker', description: 'Review auth code', dependencies: ['T2', 'T3'] },
  { id: 'V1', role: 'tester', description: 'Run auth tests', dependencies: ['Q1'] },
  { id: 'D1', role: 'documenter', description: 'Document login flow', dependencies: ['V1'] },
];

const requireValidation: QualityPredicate = ({ claimedResult }) =>
  claimedResult.artifactSummary.includes('validation')
    ? { accepted: true }
    : { accepted: false, feedback: 'missing validation' };

describe('Session lifecycle', () => {
  let projectDir: string;
  let store: SQLiteStore;
  let bus: MessageBus;
  let coordinator: SessionCoordinator;
  let workers: ScriptedWorkers;
  let clock: TestClock;

  async function finish(taskId: string, completion: Partial<Completion> = {}): Promise<void> {
    clock.advance(1000);
    workers.finish(taskId, completion);
    await flushAsync();
    await coordinator.settled();
  }

  beforeEach(() => {
    projectDir = createProjectDir();
    store = openProjectStore(projectDir);
    bus = new MessageBus();
    clock = createClock();
    coordinator = SessionCoordinator.start(store, 'Add user authentication', {
      config: createConfig(),
      bus,
      now: clock.now,
      predicates: { builder: requireValidation },
    });
    workers = new ScriptedWorkers(bus, coordinator.sessionId);
  });

  afterEach(async () => {
    workers.close();
    await coordinator.close();
    store.close();
    removeProjectDir(projectDir);
  });

  it('should plan, build with one rejection and hand over to quality check', async () => {
    await coordinator.tick();
    expect(workers.running).toEqual(['planning']);
    expect(workers.assignment('planning').agentId).toBe('planner_001');

    await finish('planning', { artifactSummary: 'Six tasks', tasks: PLAN });

    expect(coordinator.phase).toBe('implementation');
    expect(workers.running).toEqual(['T1']);

    await finish('T1', { artifactSummary: 'login form' });

    const retry = workers.assignment('T1');
    expect(retry.attempt).toBe(2);
    expect(retry.feedback).toEqual(['missing validation']);
    expect(coordinator.graph.require('T1').feedback.map(f => f.feedback)).toEqual(['missing validation']);

    await finish('T1', { artifactSummary: 'login form with validation' });

    expect(coordinator.graph.require('T1').status).toBe('completed');
    expect(workers.running).toEqual(['T2', 'T3']);
    expect(coordinator.graph.list({ status: 'in_progress' }).map(t => t.id)).toEqual(['T2', 'T3']);
    expect(workers.assignment('T2').dependencyContext).toEqual([
      { taskId: 'T1', description: 'Implement login form', result: 'login form with validation' },
    ]);

    await finish('T2', { artifactSummary: 'sessions with validation' });
    expect(coordinator.phase).toBe('implementation');

    await finish('T3', { artifactSummary: 'reset with validation' });

    expect(coordinator.phase).toBe('quality_check');
    expect(workers.running).toEqual(['Q1']);
    expect(workers.assignment('Q1').agentId).toBe('quality_checker_001');
    expect(coordinator.registry.active().map(a => a.id)).toEqual(['quality_checker_001']);
  });

  it('should run every phase through to done', async () => {
    await coordinator.tick();
    await finish('planning', { tasks: PLAN });
    await finish('T1', { artifactSummary: 'login with validation' });
    await finish('T2', { artifactSummary: 'sessions with validation' });
    await finish('T3', { artifactSummary: 'reset with validation' });
    await finish('Q1', { artifactSummary: 'No issues found' });

    expect(coordinator.phase).toBe('testing');

    await finish('V1', { artifactSummary: '14 tests pass' });
    expect(coordinator.phase).toBe('documentation');

    await finish('D1');

    expect(coordinator.phase).toBe('done');
    expect(workers.running).toEqual([]);
    expect(coordinator.registry.active()).toEqual([]);
    expect(coordinator.registry.list().map(a => a.id)).toEqual([
      'planner_001',
      'builder_001',
      'quality_checker_001',
      'tester_001',
      'documenter_001',
    ]);

    const reports = store.listReports(coordinator.sessionId);
    expect(reports.map(r => [r.payload.kind, r.phase])).toEqual([
      ['phase', 'implementation'],
      ['phase', 'quality_check'],
      ['phase', 'testing'],
      ['phase', 'documentation'],
      ['final', 'done'],
    ]);
    expect(reports.at(-1)?.completedCount).toBe(7);

    const summary = coordinator.summary();
    expect(summary.validationNotes).toEqual([
      { taskId: 'Q1', role: 'quality_checker', note: 'No issues found' },
      { taskId: 'V1', role: 'tester', note: '14 tests pass' },
    ]);
    expect(summary.recommendations).toEqual(['All phases are complete']);
  });

  it('should report a failing worker as a rejection', async () => {
    await coordinator.tick();
    await finish('planning', { tasks: PLAN });

    await finish('T1', { outcome: 'failure', artifactSummary: 'build failed' });

    expect(coordinator.graph.require('T1').retryCount).toBe(1);
    expect(workers.assignment('T1').feedback).toEqual(['build failed']);
  });
});
