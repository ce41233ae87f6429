import debug from "debug";
import { type Key, PeerNode } from "../core";
import { RequestStateError } from "../errors/kademlia-errors";
import {
  type ActionPropagator,
  ActionType,
  type KadAction,
  KadActionsBuilder,
  PayloadType,
} from "../protocol";
import type { NodeDataProvider } from "../routing";
import type { FindNodeResultListener } from "./listeners";
import { LookupRounds, RoundStatus } from "./lookup-rounds";
import { type PendingRequest, RequestState } from "./pending-request";
import { DEFAULT_K } from "./pending-request.constants";

const log = debug("kad:find-node");

export type FindNodePendingRequestOptions = {
  /**
   * Peers queried per round (default: 5)
   */
  k?: number;
  actionsBuilder?: KadActionsBuilder;
};

/**
 * Iterative FIND_NODE lookup. Runs the same rounds as a FIND_VALUE lookup;
 * it is FOUND as soon as the peer owning the target key answers or is
 * reported, and NOT_FOUND with the closest peer that answered otherwise.
 */
export class FindNodePendingRequest implements PendingRequest {
  private requestState = RequestState.IDLE;
  private totalStepsTaken = 0;

  private readonly operationId: number;
  private readonly targetId: Key;
  private readonly propagator: ActionPropagator;
  private readonly resultListener: FindNodeResultListener;
  private readonly actionsBuilder: KadActionsBuilder;
  private readonly rounds: LookupRounds;

  /** @internal */
  public readonly _testing = {
    getRounds: () => this.rounds,
  };

  constructor(
    operationId: number,
    targetId: Key,
    propagator: ActionPropagator,
    nodeProvider: NodeDataProvider,
    resultListener: FindNodeResultListener,
    options: FindNodePendingRequestOptions = {},
  ) {
    this.operationId = operationId;
    this.targetId = targetId;
    this.propagator = propagator;
    this.resultListener = resultListener;
    this.actionsBuilder = options.actionsBuilder ?? new KadActionsBuilder();
    this.rounds = new LookupRounds(
      targetId,
      options.k ?? DEFAULT_K,
      nodeProvider,
      (peers) =>
        this.propagator.propagateActions(
          peers.map((peer) =>
            this.actionsBuilder.buildFindNode(
              this.operationId,
              peer.address,
              this.targetId,
            ),
          ),
        ),
    );
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
    if (this.rounds.begin().length === 0) {
      this.complete(RequestState.NOT_FOUND, null);
    }
  }

  isPertinent(action: KadAction): boolean {
    return (
      this.requestState === RequestState.ACTIVE &&
      action.actionType === ActionType.FIND_NODE_ANSWER &&
      action.operationId === this.operationId
    );
  }

  nextStep(action: KadAction): void {
    if (!this.isPertinent(action)) return;
    this.handleResponse(action);
    this.totalStepsTaken++;
  }

  expireRound(): void {
    if (this.requestState !== RequestState.ACTIVE) return;

    this.rounds.expireRound();
    this.checkStatus();
  }

  private handleResponse(action: KadAction): void {
    const sender = this.rounds.acceptAnswer(action.peer, action.totalParts);
    if (sender.key.equals(this.targetId)) {
      this.complete(RequestState.FOUND, sender);
      return;
    }

    if (action.payloadType !== PayloadType.PEER_ADDRESS) {
      return;
    }

    const candidate = this.decodeCandidate(action.payload);
    if (candidate.key.equals(this.targetId)) {
      this.complete(RequestState.FOUND, candidate);
      return;
    }

    this.rounds.offerCandidate(candidate);
    this.rounds.consumeFragment();
    this.checkStatus();
  }

  private decodeCandidate(payload: string): PeerNode {
    try {
      return PeerNode.fromAddress(payload);
    } catch (error) {
      // The fragment arrived even though it is unusable
      this.rounds.consumeFragment();
      this.checkStatus();
      throw error;
    }
  }

  private checkStatus(): void {
    if (this.rounds.evaluate() === RoundStatus.EXHAUSTED) {
      this.complete(RequestState.NOT_FOUND, this.rounds.closestVisited());
    }
  }

  private complete(
    state: RequestState.FOUND | RequestState.NOT_FOUND,
    closest: PeerNode | null,
  ): void {
    if (this.requestState !== RequestState.ACTIVE) return;

    this.requestState = state;
    log(`#${this.operationId} ${state}, closest ${closest?.address ?? "none"}`);
    this.resultListener.onFindNodeResult(this.operationId, this.targetId, closest);
  }
}
