/**
 * Agent registry - lifecycle of the agents of one session
 *
 * At most one agent per role is active. Spawning a role that already has an
 * active agent fails; the caller retires the predecessor first.
 */

import type { Agent, Role } from '../types.js';
import type { SQLiteStore } from '../store/sqlite-store.js';
import { formatAgentId } from '../store/ids.js';
import { AlreadyActiveError, NotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('agents');

export interface AgentRegistryOptions {
  now?: () => Date;
}

export class AgentRegistry {
  readonly sessionId: string;
  private readonly store: SQLiteStore;
  private readonly now: () => Date;
  private agents: Map<string, Agent> = new Map();

  constructor(store: SQLiteStore, sessionId: string, options: AgentRegistryOptions = {}) {
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
    this.agents = new Map(this.store.listAgents(this.sessionId).map(agent => [agent.id, agent]));
    log.debug('Agent registry loaded', { sessionId: this.sessionId, agents: this.agents.size });
  }

  /**
   * Start a new agent for a role
   */
  spawn(role: Role): Agent {
    const current = this.activeFor(role);
    if (current) {
      throw new AlreadyActiveError(role, current.id);
    }

    const ordinal = this.list(role).length + 1;
    const agent: Agent = {
      id: formatAgentId(role, ordinal),
      sessionId: this.sessionId,
      role,
      status: 'active',
      startedAt: this.now(),
    };

    this.store.upsertAgent(agent);
    this.agents.set(agent.id, agent);

    log.info('Spawned agent', { sessionId: this.sessionId, agentId: agent.id, role });
    return agent;
  }

  /**
   * Retire an agent. Retiring a retired agent changes nothing.
   */
  retire(agentId: string): Agent {
    const agent = this.agents.get(agentId);
    if (!agent) {
      throw new NotFoundError('agent', agentId, { sessionId: this.sessionId });
    }
    if (agent.status === 'retired') {
      return agent;
    }

    const retired: Agent = { ...agent, status: 'retired', retiredAt: this.now() };
    this.store.upsertAgent(retired);
    this.agents.set(agentId, retired);

    log.info('Retired agent', { sessionId: this.sessionId, agentId, role: agent.role });
    return retired;
  }

  /**
   * Retire every active agent whose role is not in `keep`
   */
  retireAllExcept(keep: Iterable<Role>): Agent[] {
    const kept = new Set(keep);
    return this.active()
      .filter(agent => !kept.has(agent.role))
      .map(agent => this.retire(agent.id));
  }

  activeFor(role: Role): Agent | null {
    for (const agent of this.agents.values()) {
      if (agent.role === role && agent.status === 'active') {
        return agent;
      }
    }
    return null;
  }

  active(): Agent[] {
    return this.list().filter(agent => agent.status === 'active');
  }

  get(agentId: string): Agent | null {
    return this.agents.get(agentId) ?? null;
  }

  /**
   * Agents in spawn order
   */
  list(role?: Role): Agent[] {
    return [...this.agents.values()]
      .filter(agent => role === undefined || agent.role === role)
      .sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime() || a.id.localeCompare(b.id));
  }
}
