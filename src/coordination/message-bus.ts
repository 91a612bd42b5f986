/**
 * Message bus - EventEmitter-based messaging between the coordinator and
 * the agent execution collaborator
 *
 * Assignments travel as `task:assign` messages to a session's worker
 * address; completions come back as `task:result` messages to the
 * coordinator address. Result payloads are untrusted until validated.
 */

import { EventEmitter } from 'node:events';
import type { Assignment, Completion } from '../types.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const log = logger.child('bus');

interface MessageEnvelope {
  id: string;
  from: string;
  to: string;
  timestamp: Date;
}

export type OutgoingMessage =
  | { from: string; to: string; type: 'task:assign'; payload: Assignment }
  | { from: string; to: string; type: 'task:result'; payload: unknown };

export type Message = MessageEnvelope & OutgoingMessage;

export type MessageHandler = (message: Message) => void;

export interface MessageBusEvents {
  'message': (message: Message) => void;
  'error': (error: Error, message?: Message) => void;
}

export function coordinatorAddress(sessionId: string): string {
  return `coordinator:${sessionId}`;
}

export function workerAddress(sessionId: string): string {
  return `workers:${sessionId}`;
}

export class MessageBus extends EventEmitter {
  private messageCount = 0;
  private subscribers: Map<string, Set<MessageHandler>> = new Map();

  constructor() {
    super();
  }

  /**
   * Deliver a message to the subscribers of its address
   */
  send(outgoing: OutgoingMessage): Message {
    const message: Message = {
      ...outgoing,
      id: `msg-${++this.messageCount}`,
      timestamp: new Date(),
    };

    this.emit('message', message);

    const subs = this.subscribers.get(message.to);
    if (subs) {
      for (const callback of [...subs]) {
        try {
          callback(message);
        } catch (error) {
          this.reportError(error, message);
        }
      }
    } else {
      log.debug('No subscriber for message', { id: message.id, to: message.to, type: message.type });
    }

    log.debug('Message sent', { id: message.id, from: message.from, to: message.to, type: message.type });
    return message;
  }

  /**
   * Subscribe to messages for an address
   */
  subscribe(address: string, callback: MessageHandler): () => void {
    let subs = this.subscribers.get(address);
    if (!subs) {
      subs = new Set();
      this.subscribers.set(address, subs);
    }
    subs.add(callback);

    log.debug('Address subscribed', { address });

    // Return unsubscribe function
    return () => {
      subs?.delete(callback);
      if (subs?.size === 0) {
        this.subscribers.delete(address);
      }
    };
  }

  /**
   * Subscribe to all messages
   */
  subscribeAll(callback: MessageHandler): () => void {
    this.on('message', callback);
    return () => this.off('message', callback);
  }

  unsubscribe(address: string): boolean {
    const deleted = this.subscribers.delete(address);
    if (deleted) {
      log.debug('Address unsubscribed', { address });
    }
    return deleted;
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }

  getMessageCount(): number {
    return this.messageCount;
  }

  /**
   * Clear all subscriptions
   */
  clear(): void {
    this.subscribers.clear();
    this.removeAllListeners();
    log.debug('Bus cleared');
  }

  private reportError(error: unknown, message: Message): void {
    const err = error instanceof Error ? error : new Error(String(error));
    if (this.listenerCount('error') > 0) {
      this.emit('error', err, message);
    } else {
      log.error('Message handler failed', { id: message.id, type: message.type, error: err });
    }
  }
}

/**
 * Executes one assignment and reports what happened. A thrown error is
 * reported as a failure outcome.
 */
export type AgentExecutor = (assignment: Assignment) => Promise<Completion> | Completion;

/**
 * Serve a session's assignments with `executor`, replying on the bus
 */
export function bindExecutor(bus: MessageBus, sessionId: string, executor: AgentExecutor): () => void {
  const reply = (payload: Completion, agentId: string): void => {
    bus.send({ from: agentId, to: coordinatorAddress(sessionId), type: 'task:result', payload });
  };

  const run = async (assignment: Assignment): Promise<void> => {
    let completion: Completion;
    try {
      completion = await executor(assignment);
    } catch (error) {
      log.warn('Executor failed', { sessionId, taskId: assignment.taskId, error: errorMessage(error) });
      completion = { taskId: assignment.taskId, outcome: 'failure', artifactSummary: errorMessage(error) };
    }
    reply(completion, assignment.agentId);
  };

  return bus.subscribe(workerAddress(sessionId), message => {
    if (message.type === 'task:assign') {
      void run(message.payload);
    }
  });
}

// Singleton instance
let busInstance: MessageBus | null = null;

/**
 * Get or create the shared message bus
 */
export function getMessageBus(): MessageBus {
  if (!busInstance) {
    busInstance = new MessageBus();
  }
  return busInstance;
}

/**
 * Reset the shared message bus
 */
export function resetMessageBus(): void {
  if (busInstance) {
    busInstance.clear();
    busInstance = null;
  }
}
