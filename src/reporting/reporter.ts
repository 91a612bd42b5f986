/**
 * Reporter - progress summaries derived from the store
 *
 * Read-only: nothing here writes, so a reporter can run against a store
 * opened in read-only mode next to a live coordinator.
 */

import type { Agent, Phase, Report, Role, RunStatus, Session, Task, TaskStatus } from '../types.js';
import type { SQLiteStore } from '../store/sqlite-store.js';
import { compareReadiness } from '../tasks/task-graph.js';
import { hasCapability } from '../agents/roles.js';

export const MAX_NEXT_PRIORITIES = 5;
const DEFAULT_STALE_AFTER_MS = 30 * 60 * 1000;

export type BlockerEntry = {
  taskId: string;
  role: Role;
  description: string;
  kind: 'blocked' | 'stale';
  reason: string;
  since: string;
};

export type PriorityEntry = {
  taskId: string;
  role: Role;
  description: string;
  priority: number;
};

export type ValidationNote = {
  taskId: string;
  role: Role;
  note: string;
};

export type SessionSummary = {
  sessionId: string;
  goal: string;
  phase: Phase;
  runStatus: RunStatus;
  generatedAt: string;
  completedCount: number;
  totalCount: number;
  statusCounts: Record<TaskStatus, number>;
  activeAgents: string[];
  activeRoles: Role[];
  completedTasks: string[];
  blockers: BlockerEntry[];
  nextPriorities: PriorityEntry[];
  validationNotes: ValidationNote[];
  recommendations: string[];
};

export interface SessionSnapshot {
  session: Session;
  agents: Agent[];
  tasks: Task[];
  reports: Report[];
}

export interface SummaryOptions {
  now?: Date;
  staleAfterMs?: number;
}

export class Reporter {
  private readonly store: SQLiteStore;
  private readonly staleAfterMs: number;

  constructor(store: SQLiteStore, options: { staleAfterMs?: number } = {}) {
    this.store = store;
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
  }

  summarize(sessionId: string, options: SummaryOptions = {}): SessionSummary {
    const now = options.now ?? new Date();
    const staleAfterMs = options.staleAfterMs ?? this.staleAfterMs;

    const session = this.store.loadSession(sessionId);
    const tasks = this.store.listTasks(sessionId);
    const active = this.store.listAgents(sessionId).filter(agent => agent.status === 'active');

    const byId = new Map(tasks.map(t => [t.id, t]));
    const statusCounts: Record<TaskStatus, number> = { pending: 0, in_progress: 0, completed: 0, blocked: 0 };
    for (const task of tasks) {
      statusCounts[task.status]++;
    }

    const blockers: BlockerEntry[] = [
      ...tasks
        .filter(t => t.status === 'blocked')
        .map(t => ({
          taskId: t.id,
          role: t.role,
          description: t.description,
          kind: 'blocked' as const,
          reason: t.blockedReason ?? 'Blocked',
          since: t.updatedAt.toISOString(),
        })),
      ...staleTasks(tasks, staleAfterMs, now).map(t => ({
        taskId: t.id,
        role: t.role,
        description: t.description,
        kind: 'stale' as const,
        reason: `In progress for ${formatDuration(now.getTime() - (t.startedAt ?? now).getTime())}`,
        since: (t.startedAt ?? now).toISOString(),
      })),
    ];

    const nextPriorities = tasks
      .filter(t => t.status === 'pending' && t.dependencies.every(id => byId.get(id)?.status === 'completed'))
      .sort(compareReadiness)
      .slice(0, MAX_NEXT_PRIORITIES)
      .map(t => ({ taskId: t.id, role: t.role, description: t.description, priority: t.priority }));

    const validationNotes = tasks
      .filter(t => t.status === 'completed' && hasCapability(t.role, 'validates') && t.result)
      .map(t => ({ taskId: t.id, role: t.role, note: t.result ?? '' }));

    const completedTasks = tasks.filter(t => t.status === 'completed').map(t => t.id);

    return {
      sessionId: session.id,
      goal: session.goal,
      phase: session.phase,
      runStatus: session.runStatus,
      generatedAt: now.toISOString(),
      completedCount: statusCounts.completed,
      totalCount: tasks.length,
      statusCounts,
      activeAgents: active.map(agent => agent.id),
      activeRoles: active.map(agent => agent.role),
      completedTasks,
      blockers,
      nextPriorities,
      validationNotes,
      recommendations: recommend(session, tasks, blockers),
    };
  }

  /**
   * Everything a dashboard renders for one session
   */
  snapshot(sessionId: string): SessionSnapshot {
    return {
      session: this.store.loadSession(sessionId),
      agents: this.store.listAgents(sessionId),
      tasks: this.store.listTasks(sessionId),
      reports: this.store.listReports(sessionId),
    };
  }
}

function staleTasks(tasks: Task[], staleAfterMs: number, now: Date): Task[] {
  return tasks.filter(
    t => t.status === 'in_progress' && t.startedAt !== undefined && now.getTime() - t.startedAt.getTime() >= staleAfterMs
  );
}

function recommend(session: Session, tasks: Task[], blockers: BlockerEntry[]): string[] {
  const recommendations: string[] = [];

  const blocked = blockers.filter(b => b.kind === 'blocked').map(b => b.taskId);
  if (blocked.length > 0) {
    recommendations.push(`Resolve blocked tasks (unblock or override): ${blocked.join(', ')}`);
  }

  for (const stale of blockers.filter(b => b.kind === 'stale')) {
    recommendations.push(`Check on task ${stale.taskId}: ${stale.reason.toLowerCase()}`);
  }

  for (const task of tasks) {
    if (task.status === 'pending' && task.retryCount > 0) {
      recommendations.push(`Review feedback on task ${task.id} (rejected ${task.retryCount} time${task.retryCount === 1 ? '' : 's'})`);
    }
  }

  if (session.runStatus === 'paused') {
    recommendations.push('Resume the session to continue dispatching work');
  }

  if (session.phase === 'done') {
    recommendations.push('All phases are complete');
  } else if (recommendations.length === 0) {
    recommendations.push('Continue with the current plan');
  }

  return recommendations;
}

function formatDuration(ms: number): string {
  const minutes = Math.floor(ms / 60_000);
  if (minutes < 60) {
    return `${minutes}m`;
  }
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

/**
 * Plain-text rendering of a summary
 */
export function formatSummary(summary: SessionSummary): string {
  const lines: string[] = [];
  const list = (items: string[]): void => {
    if (items.length === 0) {
      lines.push('  None');
    }
    items.forEach((item, i) => lines.push(`  ${i + 1}. ${item}`));
  };

  lines.push(`PROJECT PROGRESS REPORT`);
  lines.push(`Session: ${summary.sessionId}`);
  lines.push(`Goal: ${summary.goal}`);
  lines.push(`Phase: ${summary.phase}${summary.runStatus === 'paused' ? ' (paused)' : ''}`);
  lines.push(`Completed tasks: ${summary.completedCount}/${summary.totalCount}`);
  lines.push(`Active agents: ${summary.activeAgents.join(', ') || 'None'}`);
  lines.push('');
  lines.push('Next priorities:');
  list(summary.nextPriorities.map(p => `[${p.role}] ${p.taskId}: ${p.description}`));
  lines.push('');
  lines.push('Blockers:');
  list(summary.blockers.map(b => `${b.taskId} (${b.kind}): ${b.reason}`));
  if (summary.validationNotes.length > 0) {
    lines.push('');
    lines.push('Validation notes:');
    list(summary.validationNotes.map(n => `[${n.role}] ${n.taskId}: ${n.note}`));
  }
  lines.push('');
  lines.push('Recommendations:');
  list(summary.recommendations);

  return lines.join('\n');
}
