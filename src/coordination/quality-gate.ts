/**
 * Quality gate - accepts or rejects claimed task completions
 *
 * The gate only decides. Accepting issues a single-use token that the task
 * graph needs to complete the task; rejecting reports whether the attempt
 * exhausts the retry ceiling. The coordinator commits either outcome.
 */

import type { Completion, QualityPredicate, QualityVerdict, Role, Task, TaskDraft } from '../types.js';
import { cloneTask, type TaskGraph } from '../tasks/task-graph.js';
import { issueAcceptance, type AcceptanceToken } from '../tasks/acceptance.js';
import { hasCapability } from '../agents/roles.js';
import { InvalidTransitionError, errorMessage } from '../utils/errors.js';
import { isRole } from '../utils/validation.js';
import { logger } from '../utils/logger.js';

const log = logger.child('quality-gate');

export const DEFAULT_MAX_RETRIES = 3;

export interface Accepted {
  verdict: 'accepted';
  token: AcceptanceToken;
  /** Task breakdown to insert along with the completion */
  drafts: TaskDraft[];
}

export interface ValidationRejected {
  verdict: 'rejected';
  feedback: string;
  /** Number of this rejection for the task, starting at 1 */
  attempt: number;
  /** The rejection reaches the retry ceiling; the task goes to blocked */
  escalated: boolean;
}

export type GateDecision = Accepted | ValidationRejected;

export interface QualityGateOptions {
  maxRetries?: number;
  predicates?: Partial<Record<Role, QualityPredicate>>;
}

/**
 * Used for roles without a registered predicate. Task-producing roles have
 * to deliver a breakdown; everything else passes on success.
 */
export const defaultPredicate: QualityPredicate = ({ role, claimedResult }) => {
  if (claimedResult.outcome === 'failure') {
    return { accepted: false, feedback: claimedResult.artifactSummary || 'Execution failed' };
  }
  if (hasCapability(role, 'producesTasks') && (claimedResult.tasks ?? []).length === 0) {
    return { accepted: false, feedback: 'No task breakdown was produced' };
  }
  return { accepted: true };
};

export class QualityGate {
  private readonly graph: TaskGraph;
  private readonly predicates: Map<Role, QualityPredicate> = new Map();
  readonly maxRetries: number;

  constructor(graph: TaskGraph, options: QualityGateOptions = {}) {
    this.graph = graph;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 1) {
      throw new RangeError(`maxRetries must be a positive integer, got ${this.maxRetries}`);
    }

    for (const [role, predicate] of Object.entries(options.predicates ?? {})) {
      if (isRole(role) && predicate) {
        this.predicates.set(role, predicate);
      }
    }
  }

  setPredicate(role: Role, predicate: QualityPredicate): void {
    this.predicates.set(role, predicate);
  }

  clearPredicate(role: Role): void {
    this.predicates.delete(role);
  }

  /**
   * Evaluate a claimed completion of an in-progress task
   */
  async review(taskId: string, claimedResult: Completion): Promise<GateDecision> {
    const task = this.graph.require(taskId);
    if (task.status !== 'in_progress') {
      throw new InvalidTransitionError(`Task '${taskId}' is ${task.status}; only in-progress work can be reviewed`, {
        taskId,
        status: task.status,
      });
    }

    // Execution failures never pass, whatever the role's predicate says
    if (claimedResult.outcome === 'failure') {
      return this.reject(task, claimedResult.artifactSummary || 'Execution failed');
    }

    const predicate = this.predicates.get(task.role) ?? defaultPredicate;
    let verdict: QualityVerdict;
    try {
      verdict = await predicate({ role: task.role, task: cloneTask(task), claimedResult });
    } catch (error) {
      log.warn('Quality predicate threw', { taskId, role: task.role, error: errorMessage(error) });
      verdict = { accepted: false, feedback: `Quality check failed: ${errorMessage(error)}` };
    }

    if (!verdict.accepted) {
      return this.reject(task, verdict.feedback || 'Rejected by quality check');
    }

    const drafts = hasCapability(task.role, 'producesTasks') ? claimedResult.tasks ?? [] : [];
    const invalid = drafts.length > 0 ? this.graph.validateDrafts(drafts) : null;
    if (invalid) {
      return this.reject(task, `Task breakdown rejected: ${invalid.message}`);
    }

    log.debug('Completion accepted', { taskId, role: task.role, drafts: drafts.length });
    return {
      verdict: 'accepted',
      token: issueAcceptance(task.sessionId, task.id, claimedResult.artifactSummary),
      drafts,
    };
  }

  /**
   * The rejection outcome for `task`, counting this attempt
   */
  reject(task: Task, feedback: string): ValidationRejected {
    const attempt = task.retryCount + 1;
    const escalated = attempt >= this.maxRetries;

    log.info('Completion rejected', { taskId: task.id, role: task.role, attempt, escalated });
    return { verdict: 'rejected', feedback, attempt, escalated };
  }
}
