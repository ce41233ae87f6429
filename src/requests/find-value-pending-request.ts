import debug from "debug";
import { type Key, PeerNode } from "../core";
import { RequestStateError } from "../errors/kademlia-errors";
import {
  type ActionPropagator,
  ActionType,
  type KadAction,
  KadActionsBuilder,
  PayloadType,
  RESOURCE_SEPARATOR,
  StringResource,
} from "../protocol";
import type { NodeDataProvider } from "../routing";
import type { FindValueResultListener } from "./listeners";
import { LookupRounds, RoundStatus } from "./lookup-rounds";
import { type PendingRequest, RequestState } from "./pending-request";
import { DEFAULT_K } from "./pending-request.constants";

const log = debug("kad:find-value");

export type FindValuePendingRequestOptions = {
  /**
   * Peers queried per round (default: 5)
   */
  k?: number;
  /**
   * Separator of the resource encoding (default: "\r")
   */
  separator?: string;
  actionsBuilder?: KadActionsBuilder;
};

/**
 * Iterative FIND_VALUE lookup.
 *
 * Each round queries the closest unvisited peers known so far. Answers carry
 * either the resource, which ends the lookup, or closer peers, one per
 * fragment; a round is over once every queried peer has answered and every
 * fragment it announced has arrived. When a round ends without any new
 * candidate the value is reported as not found.
 *
 * After completion the request ignores every action it is handed.
 */
export class FindValuePendingRequest implements PendingRequest {
  private requestState = RequestState.IDLE;
  private totalStepsTaken = 0;

  private readonly operationId: number;
  private readonly targetId: Key;
  private readonly propagator: ActionPropagator;
  private readonly resultListener: FindValueResultListener;
  private readonly separator: string;
  private readonly actionsBuilder: KadActionsBuilder;
  private readonly rounds: LookupRounds;

  // For testing access
  /** @internal */
  public readonly _testing = {
    getRounds: () => this.rounds,
  };

  /**
   * @param operationId Unique among the requests running at the same time
   * @param targetId Key of the resource looked for
   */
  constructor(
    operationId: number,
    targetId: Key,
    propagator: ActionPropagator,
    nodeProvider: NodeDataProvider,
    resultListener: FindValueResultListener,
    options: FindValuePendingRequestOptions = {},
  ) {
    this.operationId = operationId;
    this.targetId = targetId;
    this.propagator = propagator;
    this.resultListener = resultListener;
    this.separator = options.separator ?? RESOURCE_SEPARATOR;
    this.actionsBuilder = options.actionsBuilder ?? new KadActionsBuilder();
    this.rounds = new LookupRounds(
      targetId,
      options.k ?? DEFAULT_K,
      nodeProvider,
      (peers) => this.propagateToAll(peers),
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

    // Active before anything is sent: a transport may answer synchronously
    this.requestState = RequestState.ACTIVE;
    if (this.rounds.begin().length === 0) {
      log(`#${this.operationId} no known peer to ask`);
      this.complete(RequestState.NOT_FOUND, null, null);
    }
  }

  isPertinent(action: KadAction): boolean {
    return (
      this.requestState === RequestState.ACTIVE &&
      action.actionType === ActionType.FIND_VALUE_ANSWER &&
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

    const dropped = this.rounds.expireRound();
    log(`#${this.operationId} round expired, ${dropped.length} peers silent`);
    this.checkStatus();
  }

  private handleResponse(action: KadAction): void {
    const sender = this.rounds.acceptAnswer(action.peer, action.totalParts);

    switch (action.payloadType) {
      case PayloadType.PEER_ADDRESS:
        this.rounds.offerCandidate(
          this.decodeFragment(() => PeerNode.fromAddress(action.payload)),
        );
        this.rounds.consumeFragment();
        this.checkStatus();
        break;
      case PayloadType.RESOURCE:
        this.complete(
          RequestState.FOUND,
          sender,
          this.decodeFragment(() =>
            StringResource.parse(action.payload, this.separator),
          ),
        );
        break;
      default:
        break;
    }
  }

  /**
   * A fragment that fails to decode still counts as arrived, so the round
   * can complete without it. The decoding error is rethrown.
   */
  private decodeFragment<T>(decode: () => T): T {
    try {
      return decode();
    } catch (error) {
      this.rounds.consumeFragment();
      this.checkStatus();
      throw error;
    }
  }

  private checkStatus(): void {
    switch (this.rounds.evaluate()) {
      case RoundStatus.PENDING:
        break;
      case RoundStatus.NEXT_ROUND:
        log(`#${this.operationId} round ${this.rounds.getRound()} sent`);
        break;
      case RoundStatus.EXHAUSTED:
        this.complete(RequestState.NOT_FOUND, null, null);
        break;
    }
  }

  private complete(
    state: RequestState.FOUND | RequestState.NOT_FOUND,
    peer: PeerNode | null,
    resource: StringResource | null,
  ): void {
    if (this.requestState !== RequestState.ACTIVE) return;

    this.requestState = state;
    log(`#${this.operationId} ${state} after ${this.rounds.getRound()} rounds`);
    this.resultListener.onFindValueResult(this.operationId, peer, resource);
  }

  private propagateToAll(peers: PeerNode[]): void {
    this.propagator.propagateActions(
      peers.map((peer) =>
        this.actionsBuilder.buildFindValue(
          this.operationId,
          peer.address,
          this.targetId,
        ),
      ),
    );
  }
}
