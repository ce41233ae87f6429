import type { KadAction } from "../protocol";

/**
 * Lifecycle of a pending request. FOUND and NOT_FOUND are terminal.
 */
export enum RequestState {
  IDLE = "IDLE",
  ACTIVE = "ACTIVE",
  FOUND = "FOUND",
  NOT_FOUND = "NOT_FOUND",
}

export function isTerminal(state: RequestState): boolean {
  return state === RequestState.FOUND || state === RequestState.NOT_FOUND;
}

/**
 * An operation made of several correlated exchanges with remote peers. It
 * only moves when it is handed actions; it never waits on anything itself.
 */
export interface PendingRequest {
  /**
   * Send the first requests. Only allowed once, from IDLE.
   * @throws RequestStateError when called again
   */
  start(): void;

  /**
   * Whether an action continues this request. Never changes any state.
   */
  isPertinent(action: KadAction): boolean;

  /**
   * Continue the request with an action. Does nothing if the action is not
   * pertinent.
   */
  nextStep(action: KadAction): void;

  /**
   * Give up on the peers of the current round that have not answered yet.
   * Called by the integration layer when a round outlives its deadline.
   */
  expireRound(): void;

  getOperationId(): number;

  getRequestState(): RequestState;

  /**
   * Number of pertinent actions handled so far, for diagnostics only.
   */
  getTotalStepsTaken(): number;
}
