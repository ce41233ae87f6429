import debug from "debug";
import type { Key, PeerNode } from "../core";
import {
  type ActionPropagator,
  type KadAction,
  KadActionsBuilder,
  type StringResource,
} from "../protocol";
import type { NodeDataProvider } from "../routing";
import { FindNodePendingRequest } from "./find-node-pending-request";
import { FindValuePendingRequest } from "./find-value-pending-request";
import { InvitePendingRequest } from "./invite-pending-request";
import { type PendingRequest, isTerminal } from "./pending-request";
import { DEFAULT_K, DEFAULT_ROUND_TIMEOUT } from "./pending-request.constants";

const log = debug("kad:manager");

// Operation ids run from 1 to this one, then wrap
const LAST_OPERATION_ID = 2 ** 31 - 2;

export type PendingRequestManagerOptions = {
  /**
   * Transport the requests send their actions through
   */
  propagator: ActionPropagator;

  /**
   * Routing table shared by every lookup
   */
  nodeProvider: NodeDataProvider;

  /**
   * Peers queried per lookup round (default: 5)
   */
  k?: number;

  /**
   * Time a round may stay unanswered before its silent peers are given up
   * on, in milliseconds (default: 5 seconds, 0 to wait forever)
   */
  roundTimeout?: number;

  actionsBuilder?: KadActionsBuilder;
};

export type FindValueResult =
  | { found: true; peer: PeerNode; resource: StringResource }
  | { found: false };

export type FindNodeResult = {
  found: boolean;
  target: Key;
  closest: PeerNode | null;
};

/**
 * Builds a request once its operation id is known. The propagator it is
 * given must be the one the request sends through, it is how the round
 * deadline learns that a new round started.
 */
export type PendingRequestFactory<T extends PendingRequest> = (
  operationId: number,
  propagator: ActionPropagator,
) => T;

/**
 * Runs pending requests: hands out operation ids, starts the requests,
 * routes inbound actions to the request they belong to and gives up on the
 * silent peers of a round once its deadline expires. Finished requests are
 * dropped.
 */
export class PendingRequestManager {
  private readonly propagator: ActionPropagator;
  private readonly nodeProvider: NodeDataProvider;
  private readonly k: number;
  private readonly roundTimeout: number;
  private readonly actionsBuilder: KadActionsBuilder;

  private readonly requests = new Map<number, PendingRequest>();
  private readonly deadlines = new Map<number, NodeJS.Timeout>();
  private lastOperationId = 0;

  /** @internal */
  public readonly _testing = {
    getRequest: (operationId: number): PendingRequest | undefined =>
      this.requests.get(operationId),
    setLastOperationId: (operationId: number) => {
      this.lastOperationId = operationId;
    },
  };

  constructor(options: PendingRequestManagerOptions) {
    this.propagator = options.propagator;
    this.nodeProvider = options.nodeProvider;
    this.k = options.k ?? DEFAULT_K;
    this.roundTimeout = options.roundTimeout ?? DEFAULT_ROUND_TIMEOUT;
    this.actionsBuilder = options.actionsBuilder ?? new KadActionsBuilder();
  }

  /**
   * Build and start a request under a fresh operation id.
   * @returns The started request, already dropped if it finished at once
   */
  enqueueRequest<T extends PendingRequest>(
    factory: PendingRequestFactory<T>,
  ): T {
    const operationId = this.allocateOperationId();
    const request = factory(operationId, {
      propagateActions: (actions) => {
        this.armDeadline(operationId);
        this.propagator.propagateActions(actions);
      },
    });

    this.requests.set(operationId, request);
    try {
      request.start();
    } catch (error) {
      this.forget(operationId);
      throw error;
    }
    this.settle(request);

    return request;
  }

  /**
   * Look a value up.
   * Resolves once, when the value is found or every reachable peer has been
   * asked.
   */
  findValue(target: Key): Promise<FindValueResult> {
    return new Promise((resolve) => {
      this.enqueueRequest(
        (operationId, propagator) =>
          new FindValuePendingRequest(
            operationId,
            target,
            propagator,
            this.nodeProvider,
            {
              onFindValueResult: (_operationId, peer, resource) =>
                resolve(
                  peer !== null && resource !== null
                    ? { found: true, peer, resource }
                    : { found: false },
                ),
            },
            { k: this.k, actionsBuilder: this.actionsBuilder },
          ),
      );
    });
  }

  /**
   * Look up the peer owning a key, or the closest one to it.
   */
  findNode(target: Key): Promise<FindNodeResult> {
    return new Promise((resolve) => {
      this.enqueueRequest(
        (operationId, propagator) =>
          new FindNodePendingRequest(
            operationId,
            target,
            propagator,
            this.nodeProvider,
            {
              onFindNodeResult: (_operationId, _target, closest) =>
                resolve({
                  found: closest?.key.equals(target) ?? false,
                  target,
                  closest,
                }),
            },
            { k: this.k, actionsBuilder: this.actionsBuilder },
          ),
      );
    });
  }

  /**
   * Invite a peer. Resolves with false if it refuses or stays silent past
   * the round deadline.
   */
  invite(peer: PeerNode): Promise<boolean> {
    return new Promise((resolve) => {
      this.enqueueRequest(
        (operationId, propagator) =>
          new InvitePendingRequest(
            operationId,
            peer,
            propagator,
            {
              onInviteResult: (_operationId, _invited, accepted) =>
                resolve(accepted),
            },
            { actionsBuilder: this.actionsBuilder },
          ),
      );
    });
  }

  /**
   * Hand an inbound action to the request it belongs to.
   * @returns true if a request took it
   */
  processResponse(action: KadAction): boolean {
    const request = this.requests.get(action.operationId);
    if (!request?.isPertinent(action)) {
      return false;
    }

    try {
      request.nextStep(action);
    } finally {
      this.settle(request);
    }
    return true;
  }

  getActiveRequestCount(): number {
    return this.requests.size;
  }

  /**
   * Stop every deadline and drop every request. Results not delivered yet
   * never will be.
   */
  close(): void {
    for (const timer of this.deadlines.values()) {
      clearTimeout(timer);
    }
    this.deadlines.clear();
    this.requests.clear();
  }

  private allocateOperationId(): number {
    do {
      this.lastOperationId =
        this.lastOperationId >= LAST_OPERATION_ID
          ? 1
          : this.lastOperationId + 1;
    } while (this.requests.has(this.lastOperationId));
    return this.lastOperationId;
  }

  private armDeadline(operationId: number): void {
    if (this.roundTimeout <= 0) {
      return;
    }

    clearTimeout(this.deadlines.get(operationId));
    this.deadlines.set(
      operationId,
      setTimeout(() => this.onDeadline(operationId), this.roundTimeout),
    );
  }

  private onDeadline(operationId: number): void {
    this.deadlines.delete(operationId);
    const request = this.requests.get(operationId);
    if (!request) {
      return;
    }

    log(`#${operationId} round deadline expired`);
    try {
      request.expireRound();
    } catch (error) {
      console.error(`Expiring round of request ${operationId} failed:`, error);
      // Try again later rather than leave the request without a deadline
      this.armDeadline(operationId);
    } finally {
      this.settle(request);
    }
  }

  private settle(request: PendingRequest): void {
    if (isTerminal(request.getRequestState())) {
      this.forget(request.getOperationId());
    }
  }

  private forget(operationId: number): void {
    clearTimeout(this.deadlines.get(operationId));
    this.deadlines.delete(operationId);
    this.requests.delete(operationId);
  }
}
