/**
 * Acceptance tokens
 *
 * The quality gate issues one token per accepted completion. The task graph
 * completes a task only on presentation of a live token for that task, and
 * each token works once.
 */

export interface AcceptanceToken {
  readonly sessionId: string;
  readonly taskId: string;
  readonly result: string;
}

const issued = new WeakSet<AcceptanceToken>();

export function issueAcceptance(sessionId: string, taskId: string, result: string): AcceptanceToken {
  const token: AcceptanceToken = Object.freeze({ sessionId, taskId, result });
  issued.add(token);
  return token;
}

export function isLiveAcceptance(token: AcceptanceToken): boolean {
  return issued.has(token);
}

export function redeemAcceptance(token: AcceptanceToken): boolean {
  return issued.delete(token);
}
