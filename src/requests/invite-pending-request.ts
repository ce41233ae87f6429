import debug from "debug";
import type { PeerNode } from "../core";
import {
  MalformedActionError,
  RequestStateError,
} from "../errors/kademlia-errors";
import {
  type ActionPropagator,
  ActionType,
  BOOLEAN_FALSE,
  BOOLEAN_TRUE,
  type KadAction,
  KadActionsBuilder,
  PayloadType,
} from "../protocol";
import type { InviteResultListener } from "./listeners";
import { type PendingRequest, RequestState } from "./pending-request";

const log = debug("kad:invite");

export type InvitePendingRequestOptions = {
  actionsBuilder?: KadActionsBuilder;
};

/**
 * Invites one peer to join the network and waits for its answer. Only the
 * invited peer can answer; an answer, positive or not, makes the request
 * FOUND, an expired deadline makes it NOT_FOUND.
 */
export class InvitePendingRequest implements PendingRequest {
  private requestState = RequestState.IDLE;
  private totalStepsTaken = 0;

  private readonly operationId: number;
  private readonly invited: PeerNode;
  private readonly propagator: ActionPropagator;
  private readonly resultListener: InviteResultListener;
  private readonly actionsBuilder: KadActionsBuilder;

  constructor(
    operationId: number,
    invited: PeerNode,
    propagator: ActionPropagator,
    resultListener: InviteResultListener,
    options: InvitePendingRequestOptions = {},
  ) {
    this.operationId = operationId;
    this.invited = invited;
    this.propagator = propagator;
    this.resultListener = resultListener;
    this.actionsBuilder = options.actionsBuilder ?? new KadActionsBuilder();
  }

  getOperationId(): number {
    return this.operationId;
  }

  getRequestState(): RequestState {
    return this.requestState;
  }

  getTotalStepsTaken(): number {
    return this.totalStepsTaken;
  }

  start(): void {
    if (this.requestState !== RequestState.IDLE) {
      throw new RequestStateError(this.operationId, this.requestState, "start");
    }

    this.requestState = RequestState.ACTIVE;
    this.propagator.propagateActions([
      this.actionsBuilder.buildInvite(this.operationId, this.invited.address),
    ]);
  }

  isPertinent(action: KadAction): boolean {
    return (
      this.requestState === RequestState.ACTIVE &&
      action.actionType === ActionType.INVITE_ANSWER &&
      action.operationId === this.operationId &&
      action.peer === this.invited.address
    );
  }

  nextStep(action: KadAction): void {
    if (!this.isPertinent(action)) return;
    this.totalStepsTaken++;

    if (action.payloadType === PayloadType.BOOLEAN) {
      this.complete(RequestState.FOUND, this.decodeVerdict(action.payload));
    }
  }

  expireRound(): void {
    if (this.requestState !== RequestState.ACTIVE) return;
    this.complete(RequestState.NOT_FOUND, false);
  }

  private decodeVerdict(payload: string): boolean {
    if (payload === BOOLEAN_TRUE) return true;
    if (payload === BOOLEAN_FALSE) return false;
    throw new MalformedActionError(`unknown invite verdict "${payload}"`);
  }

  private complete(
    state: RequestState.FOUND | RequestState.NOT_FOUND,
    accepted: boolean,
  ): void {
    this.requestState = state;
    log(`#${this.operationId} ${this.invited.address} accepted=${accepted}`);
    this.resultListener.onInviteResult(this.operationId, this.invited, accepted);
  }
}
