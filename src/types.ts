/**
 * Core types for autocrew
 */

// Role types
export type Role =
  | 'planner'
  | 'builder'
  | 'quality_checker'
  | 'tester'
  | 'documenter';

export const ROLES: readonly Role[] = [
  'planner',
  'builder',
  'quality_checker',
  'tester',
  'documenter',
];

export interface RoleCapabilities {
  /** Completions may carry task drafts that extend the graph */
  producesTasks?: true;
  /** Can be assigned tasks by the coordinator */
  consumesTask?: true;
  /** Accepted results are surfaced as validation notes */
  validates?: true;
}

export interface RoleDefinition {
  role: Role;
  name: string;
  description: string;
  authority: string[];
  homePhase: Phase;
  capabilities: RoleCapabilities;
}

// Phase types
export type Phase =
  | 'planning'
  | 'implementation'
  | 'quality_check'
  | 'testing'
  | 'documentation'
  | 'done';

export type RunStatus = 'running' | 'paused';

// Session types
export interface Session {
  id: string;
  goal: string;
  phase: Phase;
  runStatus: RunStatus;
  createdAt: Date;
  updatedAt: Date;
}

// Agent types
export type AgentStatus = 'active' | 'retired';

export interface Agent {
  id: string;
  sessionId: string;
  role: Role;
  status: AgentStatus;
  startedAt: Date;
  retiredAt?: Date;
}

// Task types
export type TaskStatus = 'pending' | 'in_progress' | 'completed' | 'blocked';

export interface TaskFeedback {
  attempt: number;
  feedback: string;
  at: Date;
}

export interface Task {
  id: string;
  sessionId: string;
  role: Role;
  description: string;
  status: TaskStatus;
  dependencies: string[];
  priority: number;
  sequence: number;
  retryCount: number;
  feedback: TaskFeedback[];
  assignedAgentId?: string;
  result?: string;
  blockedReason?: string;
  blockedBy?: string;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  updatedAt: Date;
}

export interface TaskDraft {
  id: string;
  role: Role;
  description: string;
  dependencies?: string[];
  priority?: number;
}

// Report types
export type ReportKind = 'phase' | 'pause' | 'resume' | 'escalation' | 'manual' | 'final';

export interface Report {
  id: number;
  sessionId: string;
  timestamp: Date;
  phase: Phase;
  completedCount: number;
  payload: Record<string, unknown>;
}

// Agent execution collaborator messages
export interface DependencyContext {
  taskId: string;
  description: string;
  result?: string;
}

export interface Assignment {
  sessionId: string;
  agentId: string;
  role: Role;
  taskId: string;
  description: string;
  dependencyContext: DependencyContext[];
  feedback: string[];
  attempt: number;
  redelivery: boolean;
}

export type ExecutionOutcome = 'success' | 'failure';

export interface Completion {
  taskId: string;
  outcome: ExecutionOutcome;
  artifactSummary: string;
  /** Task breakdown, honoured only for task-producing roles */
  tasks?: TaskDraft[];
}

// Quality predicate collaborator
export interface QualityReviewInput {
  role: Role;
  task: Task;
  claimedResult: Completion;
}

export interface QualityVerdict {
  accepted: boolean;
  feedback?: string;
}

export type QualityPredicate = (
  input: QualityReviewInput
) => QualityVerdict | Promise<QualityVerdict>;

// Configuration types
export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error';

export interface StoreConfig {
  fileName: string;
}

export interface QualityConfig {
  maxRetries: number;
}

export interface CoordinatorConfig {
  maxInFlightPerRole: number;
  staleAfterMs: number;
  redeliverOnResume: boolean;
}

export interface LoggingConfig {
  level: LogLevelSetting;
  format?: 'json' | 'pretty';
  sentryDsn?: string;
}

export interface AutocrewConfig {
  version: string;
  store: StoreConfig;
  quality: QualityConfig;
  coordinator: CoordinatorConfig;
  logging: LoggingConfig;
}

// Phase transition rules
export const PHASE_ORDER: readonly Phase[] = [
  'planning',
  'implementation',
  'quality_check',
  'testing',
  'documentation',
  'done',
];

export const PHASE_TRANSITIONS: Record<Phase, Phase[]> = {
  planning: ['implementation'],
  implementation: ['quality_check'],
  quality_check: ['testing'],
  testing: ['documentation'],
  documentation: ['done'],
  done: [],
};

// Valid task status transitions (human overrides excluded)
export const TASK_STATUS_TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  pending: ['in_progress', 'blocked'],
  in_progress: ['completed', 'pending', 'blocked'],
  completed: [],
  blocked: [],
};
