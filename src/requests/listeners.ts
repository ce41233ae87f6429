import type { Key, PeerNode } from "../core";
import type { StringResource } from "../protocol";

/**
 * Receives the outcome of a FIND_VALUE lookup, exactly once.
 * `peer` and `resource` are both null when the value could not be found,
 * otherwise `peer` is the one that returned `resource`.
 */
export interface FindValueResultListener {
  onFindValueResult(
    operationId: number,
    peer: PeerNode | null,
    resource: StringResource | null,
  ): void;
}

/**
 * Receives the outcome of a FIND_NODE lookup, exactly once.
 * `closest` is the peer owning `target` when it was found, the closest peer
 * that answered otherwise, and null when no peer answered at all.
 */
export interface FindNodeResultListener {
  onFindNodeResult(
    operationId: number,
    target: Key,
    closest: PeerNode | null,
  ): void;
}

/**
 * Receives the outcome of an INVITE, exactly once. `accepted` is false when
 * the invite was refused or never answered.
 */
export interface InviteResultListener {
  onInviteResult(operationId: number, invited: PeerNode, accepted: boolean): void;
}
