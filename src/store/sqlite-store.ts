/**
 * SQLite-backed persistent store for sessions, agents, tasks and reports
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type {
  Agent,
  AgentStatus,
  Phase,
  Report,
  Role,
  RunStatus,
  Session,
  Task,
  TaskFeedback,
  TaskStatus,
} from '../types.js';
import { NotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { generateSessionId } from './ids.js';

const log = logger.child('sqlite');

const SCHEMA = `
-- Sessions table
CREATE TABLE IF NOT EXISTS sessions (
  id TEXT PRIMARY KEY,
  goal TEXT NOT NULL,
  phase TEXT NOT NULL DEFAULT 'planning',
  run_status TEXT NOT NULL DEFAULT 'running',
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

-- Agents table
CREATE TABLE IF NOT EXISTS agents (
  id TEXT NOT NULL,
  session_id TEXT NOT NULL,
  role TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'active',
  started_at INTEGER NOT NULL,
  retired_at INTEGER,
  PRIMARY KEY (session_id, id),
  FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_agents_role ON agents(session_id, role);

-- At most one active agent per role per session
CREATE UNIQUE INDEX IF NOT EXISTS idx_agents_active_role
  ON agents(session_id, role) WHERE status = 'active';

-- Tasks table
CREATE TABLE IF NOT EXISTS tasks (
  id TEXT NOT NULL,
  session_id TEXT NOT NULL,
  role TEXT NOT NULL,
  description TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending',
  dependencies TEXT NOT NULL DEFAULT '[]',
  priority INTEGER NOT NULL DEFAULT 5,
  sequence INTEGER NOT NULL,
  retry_count INTEGER NOT NULL DEFAULT 0,
  feedback TEXT NOT NULL DEFAULT '[]',
  assigned_agent_id TEXT,
  result TEXT,
  blocked_reason TEXT,
  blocked_by TEXT,
  created_at INTEGER NOT NULL,
  started_at INTEGER,
  completed_at INTEGER,
  updated_at INTEGER NOT NULL,
  PRIMARY KEY (session_id, id),
  FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(session_id, status);

-- Reports table (append-only)
CREATE TABLE IF NOT EXISTS reports (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id TEXT NOT NULL,
  timestamp INTEGER NOT NULL,
  phase TEXT NOT NULL,
  completed_count INTEGER NOT NULL DEFAULT 0,
  payload TEXT NOT NULL DEFAULT '{}',
  FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_reports_session ON reports(session_id);
`;

const StringListSchema = z.array(z.string());
const FeedbackListSchema = z.array(z.object({
  attempt: z.number(),
  feedback: z.string(),
  at: z.number(),
}));
const PayloadSchema = z.record(z.unknown());

function parseJson<S extends z.ZodTypeAny>(schema: S, text: string, column: string): z.infer<S> {
  const result = schema.safeParse(JSON.parse(text));
  if (!result.success) {
    throw new Error(`Corrupt ${column} column: ${result.error.issues[0]?.message ?? 'invalid value'}`);
  }
  return result.data;
}

export interface SQLiteStoreOptions {
  /** Open an existing database without write access */
  readonly?: boolean;
}

export interface SessionPatch {
  phase?: Phase;
  runStatus?: RunStatus;
}

export interface ReportInput {
  phase: Phase;
  completedCount: number;
  payload: Record<string, unknown>;
  timestamp?: Date;
}

export class SQLiteStore {
  private db: Database.Database;
  readonly dbPath: string;
  readonly readonly: boolean;

  constructor(dbPath: string, options: SQLiteStoreOptions = {}) {
    this.dbPath = dbPath;
    this.readonly = options.readonly ?? false;

    if (this.readonly) {
      this.db = new Database(dbPath, { readonly: true, fileMustExist: true });
    } else {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }

      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('foreign_keys = ON');
      this.db.exec(SCHEMA);
    }

    log.debug('SQLite store initialized', { path: dbPath, readonly: this.readonly });
  }

  // ==================== Session Operations ====================

  createSession(goal: string, now: Date = new Date()): Session {
    const id = generateSessionId(now);
    const ts = now.getTime();

    this.db
      .prepare(`
        INSERT INTO sessions (id, goal, phase, run_status, created_at, updated_at)
        VALUES (?, ?, 'planning', 'running', ?, ?)
      `)
      .run(id, goal, ts, ts);

    log.info('Session created', { sessionId: id });

    return {
      id,
      goal,
      phase: 'planning',
      runStatus: 'running',
      createdAt: new Date(ts),
      updatedAt: new Date(ts),
    };
  }

  getSession(id: string): Session | null {
    const row = this.db
      .prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?')
      .get(id);

    return row ? this.rowToSession(row) : null;
  }

  /**
   * Load a session, failing with NotFound for unknown ids
   */
  loadSession(id: string): Session {
    const session = this.getSession(id);
    if (!session) {
      throw new NotFoundError('session', id);
    }
    return session;
  }

  updateSession(id: string, patch: SessionPatch, now: Date = new Date()): Session {
    return this.transaction(() => {
      const current = this.loadSession(id);
      const phase = patch.phase ?? current.phase;
      const runStatus = patch.runStatus ?? current.runStatus;

      this.db
        .prepare('UPDATE sessions SET phase = ?, run_status = ?, updated_at = ? WHERE id = ?')
        .run(phase, runStatus, now.getTime(), id);

      return { ...current, phase, runStatus, updatedAt: new Date(now.getTime()) };
    });
  }

  /**
   * List sessions, newest first
   */
  listSessions(): Session[] {
    const rows = this.db
      .prepare<[], SessionRow>('SELECT * FROM sessions ORDER BY id DESC')
      .all();
    return rows.map(row => this.rowToSession(row));
  }

  getLatestSession(): Session | null {
    const row = this.db
      .prepare<[], SessionRow>('SELECT * FROM sessions ORDER BY id DESC LIMIT 1')
      .get();
    return row ? this.rowToSession(row) : null;
  }

  private requireSession(id: string): void {
    const row = this.db.prepare<[string], { id: string }>('SELECT id FROM sessions WHERE id = ?').get(id);
    if (!row) {
      throw new NotFoundError('session', id);
    }
  }

  private rowToSession(row: SessionRow): Session {
    return {
      id: row.id,
      goal: row.goal,
      phase: row.phase,
      runStatus: row.run_status,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }

  // ==================== Agent Operations ====================

  upsertAgent(agent: Agent): void {
    this.transaction(() => {
      this.requireSession(agent.sessionId);
      this.db
        .prepare(`
          INSERT INTO agents (id, session_id, role, status, started_at, retired_at)
          VALUES (?, ?, ?, ?, ?, ?)
          ON CONFLICT(session_id, id) DO UPDATE SET
            role = excluded.role,
            status = excluded.status,
            started_at = excluded.started_at,
            retired_at = excluded.retired_at
        `)
        .run(
          agent.id,
          agent.sessionId,
          agent.role,
          agent.status,
          agent.startedAt.getTime(),
          agent.retiredAt?.getTime() ?? null
        );
    });
  }

  getAgent(sessionId: string, agentId: string): Agent | null {
    const row = this.db
      .prepare<[string, string], AgentRow>('SELECT * FROM agents WHERE session_id = ? AND id = ?')
      .get(sessionId, agentId);
    return row ? this.rowToAgent(row) : null;
  }

  listAgents(sessionId: string, role?: Role): Agent[] {
    let query = 'SELECT * FROM agents WHERE session_id = ?';
    const params: string[] = [sessionId];

    if (role) {
      query += ' AND role = ?';
      params.push(role);
    }

    query += ' ORDER BY started_at ASC, id ASC';

    const rows = this.db.prepare<string[], AgentRow>(query).all(...params);
    return rows.map(row => this.rowToAgent(row));
  }

  private rowToAgent(row: AgentRow): Agent {
    return {
      id: row.id,
      sessionId: row.session_id,
      role: row.role,
      status: row.status,
      startedAt: new Date(row.started_at),
      retiredAt: row.retired_at !== null ? new Date(row.retired_at) : undefined,
    };
  }

  // ==================== Task Operations ====================

  upsertTask(task: Task): void {
    this.transaction(() => {
      this.requireSession(task.sessionId);
      this.db
        .prepare(`
          INSERT INTO tasks (
            id, session_id, role, description, status, dependencies, priority, sequence,
            retry_count, feedback, assigned_agent_id, result, blocked_reason, blocked_by,
            created_at, started_at, completed_at, updated_at
          )
          VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT(session_id, id) DO UPDATE SET
            role = excluded.role,
            description = excluded.description,
            status = excluded.status,
            dependencies = excluded.dependencies,
            priority = excluded.priority,
            retry_count = excluded.retry_count,
            feedback = excluded.feedback,
            assigned_agent_id = excluded.assigned_agent_id,
            result = excluded.result,
            blocked_reason = excluded.blocked_reason,
            blocked_by = excluded.blocked_by,
            started_at = excluded.started_at,
            completed_at = excluded.completed_at,
            updated_at = excluded.updated_at
        `)
        .run(
          task.id,
          task.sessionId,
          task.role,
          task.description,
          task.status,
          JSON.stringify(task.dependencies),
          task.priority,
          task.sequence,
          task.retryCount,
          JSON.stringify(task.feedback.map(f => ({ ...f, at: f.at.getTime() }))),
          task.assignedAgentId ?? null,
          task.result ?? null,
          task.blockedReason ?? null,
          task.blockedBy ?? null,
          task.createdAt.getTime(),
          task.startedAt?.getTime() ?? null,
          task.completedAt?.getTime() ?? null,
          task.updatedAt.getTime()
        );
    });
  }

  getTask(sessionId: string, taskId: string): Task | null {
    const row = this.db
      .prepare<[string, string], TaskRow>('SELECT * FROM tasks WHERE session_id = ? AND id = ?')
      .get(sessionId, taskId);
    return row ? this.rowToTask(row) : null;
  }

  /**
   * List tasks in insertion order
   */
  listTasks(sessionId: string, status?: TaskStatus): Task[] {
    let query = 'SELECT * FROM tasks WHERE session_id = ?';
    const params: string[] = [sessionId];

    if (status) {
      query += ' AND status = ?';
      params.push(status);
    }

    query += ' ORDER BY sequence ASC';

    const rows = this.db.prepare<string[], TaskRow>(query).all(...params);
    return rows.map(row => this.rowToTask(row));
  }

  deleteTask(sessionId: string, taskId: string): boolean {
    const result = this.db
      .prepare('DELETE FROM tasks WHERE session_id = ? AND id = ?')
      .run(sessionId, taskId);
    return result.changes > 0;
  }

  nextTaskSequence(sessionId: string): number {
    const row = this.db
      .prepare<[string], { next: number }>(
        'SELECT COALESCE(MAX(sequence), 0) + 1 AS next FROM tasks WHERE session_id = ?'
      )
      .get(sessionId);
    return row?.next ?? 1;
  }

  private rowToTask(row: TaskRow): Task {
    const feedback: TaskFeedback[] = parseJson(FeedbackListSchema, row.feedback, 'tasks.feedback')
      .map(f => ({ attempt: f.attempt, feedback: f.feedback, at: new Date(f.at) }));

    return {
      id: row.id,
      sessionId: row.session_id,
      role: row.role,
      description: row.description,
      status: row.status,
      dependencies: parseJson(StringListSchema, row.dependencies, 'tasks.dependencies'),
      priority: row.priority,
      sequence: row.sequence,
      retryCount: row.retry_count,
      feedback,
      assignedAgentId: row.assigned_agent_id ?? undefined,
      result: row.result ?? undefined,
      blockedReason: row.blocked_reason ?? undefined,
      blockedBy: row.blocked_by ?? undefined,
      createdAt: new Date(row.created_at),
      startedAt: row.started_at !== null ? new Date(row.started_at) : undefined,
      completedAt: row.completed_at !== null ? new Date(row.completed_at) : undefined,
      updatedAt: new Date(row.updated_at),
    };
  }

  // ==================== Report Operations ====================

  appendReport(sessionId: string, input: ReportInput): Report {
    return this.transaction(() => {
      this.requireSession(sessionId);
      const timestamp = input.timestamp ?? new Date();
      const result = this.db
        .prepare(`
          INSERT INTO reports (session_id, timestamp, phase, completed_count, payload)
          VALUES (?, ?, ?, ?, ?)
        `)
        .run(sessionId, timestamp.getTime(), input.phase, input.completedCount, JSON.stringify(input.payload));

      return {
        id: Number(result.lastInsertRowid),
        sessionId,
        timestamp: new Date(timestamp.getTime()),
        phase: input.phase,
        completedCount: input.completedCount,
        payload: { ...input.payload },
      };
    });
  }

  /**
   * List reports, oldest first
   */
  listReports(sessionId: string): Report[] {
    const rows = this.db
      .prepare<[string], ReportRow>('SELECT * FROM reports WHERE session_id = ? ORDER BY id ASC')
      .all(sessionId);

    return rows.map(row => ({
      id: row.id,
      sessionId: row.session_id,
      timestamp: new Date(row.timestamp),
      phase: row.phase,
      completedCount: row.completed_count,
      payload: parseJson(PayloadSchema, row.payload, 'reports.payload'),
    }));
  }

  // ==================== Cleanup ====================

  /**
   * Execute a function within a transaction
   * Automatically commits on success and rolls back on error; nests as a savepoint
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      log.debug('SQLite store closed', { path: this.dbPath });
    }
  }
}

// Row types for SQLite results
interface SessionRow {
  id: string;
  goal: string;
  phase: Phase;
  run_status: RunStatus;
  created_at: number;
  updated_at: number;
}

interface AgentRow {
  id: string;
  session_id: string;
  role: Role;
  status: AgentStatus;
  started_at: number;
  retired_at: number | null;
}

interface TaskRow {
  id: string;
  session_id: string;
  role: Role;
  description: string;
  status: TaskStatus;
  dependencies: string;
  priority: number;
  sequence: number;
  retry_count: number;
  feedback: string;
  assigned_agent_id: string | null;
  result: string | null;
  blocked_reason: string | null;
  blocked_by: string | null;
  created_at: number;
  started_at: number | null;
  completed_at: number | null;
  updated_at: number;
}

interface ReportRow {
  id: number;
  session_id: string;
  timestamp: number;
  phase: Phase;
  completed_count: number;
  payload: string;
}
