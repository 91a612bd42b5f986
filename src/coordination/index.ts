/**
 * Coordination module exports
 */

export {
  MessageBus,
  getMessageBus,
  resetMessageBus,
  bindExecutor,
  coordinatorAddress,
  workerAddress,
  type Message,
  type MessageHandler,
  type OutgoingMessage,
  type AgentExecutor,
} from './message-bus.js';
export { phaseIndex, nextPhase, expectedRoles, isPhaseComplete } from './phases.js';
export {
  QualityGate,
  defaultPredicate,
  DEFAULT_MAX_RETRIES,
  type Accepted,
  type ValidationRejected,
  type GateDecision,
  type QualityGateOptions,
} from './quality-gate.js';
export {
  SessionCoordinator,
  PLANNING_TASK_ID,
  PLANNING_TASK_PRIORITY,
  type SessionCoordinatorOptions,
  type SessionCoordinatorEvents,
  type TickResult,
} from './session-coordinator.js';
