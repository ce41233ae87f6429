import type { Key, PeerAddress, PeerNode } from "../core";
import { MalformedActionError } from "../errors/kademlia-errors";
import { ActionType, KadAction, PayloadType } from "./kad-action";
import { BOOLEAN_FALSE, BOOLEAN_TRUE } from "./protocol.constants";
import type { StringResource } from "./string-resource";

/**
 * Builds the actions exchanged by lookups. Answers that carry peers are
 * split in one fragment per peer, all of them declaring the same
 * `totalParts`.
 */
export class KadActionsBuilder {
  buildFindNode(operationId: number, peer: PeerAddress, target: Key): KadAction {
    return this.buildKeyRequest(ActionType.FIND_NODE, operationId, peer, target);
  }

  buildFindNodeAnswer(
    operationId: number,
    peer: PeerAddress,
    closest: PeerNode[],
  ): KadAction[] {
    return this.buildPeerFragments(
      ActionType.FIND_NODE_ANSWER,
      operationId,
      peer,
      closest,
    );
  }

  buildFindValue(
    operationId: number,
    peer: PeerAddress,
    target: Key,
  ): KadAction {
    return this.buildKeyRequest(
      ActionType.FIND_VALUE,
      operationId,
      peer,
      target,
    );
  }

  /**
   * Answer a FIND_VALUE with the resource itself.
   */
  buildFindValueAnswer(
    operationId: number,
    peer: PeerAddress,
    resource: StringResource,
  ): KadAction {
    return new KadAction({
      peer,
      actionType: ActionType.FIND_VALUE_ANSWER,
      operationId,
      payloadType: PayloadType.RESOURCE,
      payload: resource.toString(),
    });
  }

  /**
   * Answer a FIND_VALUE with closer peers, the value not being stored here.
   */
  buildFindValueNodesAnswer(
    operationId: number,
    peer: PeerAddress,
    closest: PeerNode[],
  ): KadAction[] {
    return this.buildPeerFragments(
      ActionType.FIND_VALUE_ANSWER,
      operationId,
      peer,
      closest,
    );
  }

  buildInvite(operationId: number, peer: PeerAddress): KadAction {
    return new KadAction({
      peer,
      actionType: ActionType.INVITE,
      operationId,
      payloadType: PayloadType.IGNORED,
      payload: "",
    });
  }

  buildInviteAnswer(
    operationId: number,
    peer: PeerAddress,
    accepted: boolean,
  ): KadAction {
    return new KadAction({
      peer,
      actionType: ActionType.INVITE_ANSWER,
      operationId,
      payloadType: PayloadType.BOOLEAN,
      payload: accepted ? BOOLEAN_TRUE : BOOLEAN_FALSE,
    });
  }

  private buildKeyRequest(
    actionType: ActionType,
    operationId: number,
    peer: PeerAddress,
    target: Key,
  ): KadAction {
    return new KadAction({
      peer,
      actionType,
      operationId,
      payloadType: PayloadType.KEY,
      payload: target.toHex(),
    });
  }

  private buildPeerFragments(
    actionType: ActionType,
    operationId: number,
    peer: PeerAddress,
    closest: PeerNode[],
  ): KadAction[] {
    // A request must be answered by at least one fragment, or the asking
    // round would wait forever
    if (closest.length === 0) {
      throw new MalformedActionError(
        `${actionType} needs at least one peer to carry`,
      );
    }

    return closest.map(
      (node, index) =>
        new KadAction({
          peer,
          actionType,
          operationId,
          payloadType: PayloadType.PEER_ADDRESS,
          payload: node.address,
          currentPart: index + 1,
          totalParts: closest.length,
        }),
    );
  }
}
