import { vi } from "vitest";
import { PeerNode } from "../core";
import {
  ActionType,
  KadAction,
  PayloadType,
  type StringResource,
} from "../protocol";
import type { NodeDataProvider } from "../routing";

export function createPeerFixture(index: number): PeerNode {
  return PeerNode.fromAddress(
    `10.0.${Math.floor(index / 256)}.${index % 256}:4000`,
  );
}

/**
 * A FIND_VALUE answer from `sender` carrying the address of `reported`.
 */
export function peerAnswerFixture(
  operationId: number,
  sender: PeerNode,
  reported: PeerNode,
  totalParts = 1,
  currentPart = 1,
  actionType = ActionType.FIND_VALUE_ANSWER,
): KadAction {
  return new KadAction({
    peer: sender.address,
    actionType,
    operationId,
    payloadType: PayloadType.PEER_ADDRESS,
    payload: reported.address,
    currentPart,
    totalParts,
  });
}

export function resourceAnswerFixture(
  operationId: number,
  sender: PeerNode,
  resource: StringResource,
): KadAction {
  return new KadAction({
    peer: sender.address,
    actionType: ActionType.FIND_VALUE_ANSWER,
    operationId,
    payloadType: PayloadType.RESOURCE,
    payload: resource.toString(),
  });
}

/**
 * A routing table stand-in: `kClosest` returns `initial`, `filterKClosest`
 * keeps the candidates in the order it is given them.
 */
export function createNodeProviderFixture(initial: PeerNode[]) {
  return {
    kClosest: vi.fn<NodeDataProvider["kClosest"]>(() => initial),
    filterKClosest: vi.fn<NodeDataProvider["filterKClosest"]>(
      (k, _target, candidates) => candidates.slice(0, k),
    ),
    markVisited: vi.fn<NodeDataProvider["markVisited"]>(),
  };
}
