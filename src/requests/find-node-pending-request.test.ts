import { type Mock, beforeEach, describe, expect, it, vi } from "vitest";
import {
  createNodeProviderFixture,
  createPeerFixture,
  peerAnswerFixture,
} from "../__fixtures__/peers.fixture";
import { Key, type PeerNode, calculateScalarDistance } from "../core";
import { InvalidAddressError } from "../errors/kademlia-errors";
import {
  type ActionPropagator,
  ActionType,
  KadAction,
  PayloadType,
} from "../protocol";
import { FindNodePendingRequest } from "./find-node-pending-request";
import type { FindNodeResultListener } from "./listeners";
import { RequestState } from "./pending-request";

const OPERATION_ID = 7;

describe("FindNodePendingRequest", () => {
  const [p1, p2, p3] = [1, 2, 3].map(createPeerFixture);

  let propagator: {
    propagateActions: Mock<ActionPropagator["propagateActions"]>;
  };
  let listener: {
    onFindNodeResult: Mock<FindNodeResultListener["onFindNodeResult"]>;
  };

  const answer = (sender: PeerNode, reported: PeerNode) =>
    peerAnswerFixture(
      OPERATION_ID,
      sender,
      reported,
      1,
      1,
      ActionType.FIND_NODE_ANSWER,
    );

  const createRequest = (
    target: Key,
    initial: PeerNode[],
  ): FindNodePendingRequest => {
    return new FindNodePendingRequest(
      OPERATION_ID,
      target,
      propagator,
      createNodeProviderFixture(initial),
      listener,
    );
  };

  beforeEach(() => {
    propagator = {
      propagateActions: vi.fn<ActionPropagator["propagateActions"]>(),
    };
    listener = {
      onFindNodeResult: vi.fn<FindNodeResultListener["onFindNodeResult"]>(),
    };
  });

  it("should send FIND_NODE to the closest known peers", () => {
    // GIVEN
    const target = Key.fromAddress("192.168.0.1:4000");
    const request = createRequest(target, [p1, p2]);

    // WHEN
    request.start();

    // THEN
    const [actions] = propagator.propagateActions.mock.calls[0];
    expect(actions.map((action) => action.peer)).toEqual([
      p1.address,
      p2.address,
    ]);
    expect(actions.map((action) => action.actionType)).toEqual([
      ActionType.FIND_NODE,
      ActionType.FIND_NODE,
    ]);
    expect(actions[0].payload).toBe(target.toHex());
    expect(request.getRequestState()).toBe(RequestState.ACTIVE);
  });

  it("should be found when the owner of the key answers", () => {
    // GIVEN
    const request = createRequest(p3.key, [p1, p2, p3]);
    request.start();

    // WHEN
    request.nextStep(answer(p3, createPeerFixture(11)));

    // THEN
    expect(listener.onFindNodeResult).toHaveBeenCalledOnce();
    expect(listener.onFindNodeResult).toHaveBeenCalledWith(
      OPERATION_ID,
      p3.key,
      p3,
    );
    expect(request.getRequestState()).toBe(RequestState.FOUND);
  });

  it("should be found when the owner of the key is reported", () => {
    // GIVEN
    const owner = createPeerFixture(11);
    const request = createRequest(owner.key, [p1, p2]);
    request.start();

    // WHEN
    request.nextStep(answer(p1, owner));

    // THEN
    expect(listener.onFindNodeResult).toHaveBeenCalledWith(
      OPERATION_ID,
      owner.key,
      owner,
    );
    expect(request.getRequestState()).toBe(RequestState.FOUND);
    expect(request.isPertinent(answer(p2, p1))).toBe(false);
  });

  it("should report the closest peer that answered when the owner is unknown", () => {
    // GIVEN
    const target = Key.fromAddress("192.168.0.1:4000");
    const request = createRequest(target, [p1, p2]);
    const [closest] = [p1, p2].sort((a, b) => {
      const da = calculateScalarDistance(target, a.key);
      const db = calculateScalarDistance(target, b.key);
      return da < db ? -1 : da > db ? 1 : 0;
    });
    request.start();

    // WHEN
    request.nextStep(answer(p1, p2));
    request.nextStep(answer(p2, p1));

    // THEN
    expect(listener.onFindNodeResult).toHaveBeenCalledOnce();
    expect(listener.onFindNodeResult).toHaveBeenCalledWith(
      OPERATION_ID,
      target,
      closest,
    );
    expect(request.getRequestState()).toBe(RequestState.NOT_FOUND);
    expect(propagator.propagateActions).toHaveBeenCalledOnce();
  });

  it("should report no peer when nobody is known", () => {
    // GIVEN
    const target = Key.fromAddress("192.168.0.1:4000");
    const request = createRequest(target, []);

    // WHEN
    request.start();

    // THEN
    expect(listener.onFindNodeResult).toHaveBeenCalledWith(
      OPERATION_ID,
      target,
      null,
    );
    expect(request.getRequestState()).toBe(RequestState.NOT_FOUND);
  });

  it("should report no peer when every queried peer stays silent", () => {
    // GIVEN
    const target = Key.fromAddress("192.168.0.1:4000");
    const request = createRequest(target, [p1, p2]);
    request.start();

    // WHEN
    request.expireRound();

    // THEN
    expect(listener.onFindNodeResult).toHaveBeenCalledWith(
      OPERATION_ID,
      target,
      null,
    );
  });

  it("should count a fragment that does not decode as arrived", () => {
    // GIVEN
    const target = Key.fromAddress("192.168.0.1:4000");
    const request = createRequest(target, [p1]);
    request.start();

    // WHEN
    expect(() =>
      request.nextStep(
        new KadAction({
          peer: p1.address,
          actionType: ActionType.FIND_NODE_ANSWER,
          operationId: OPERATION_ID,
          payloadType: PayloadType.PEER_ADDRESS,
          payload: "nowhere",
        }),
      ),
    ).toThrow(InvalidAddressError);

    // THEN
    expect(listener.onFindNodeResult).toHaveBeenCalledWith(
      OPERATION_ID,
      target,
      p1,
    );
    expect(request.getRequestState()).toBe(RequestState.NOT_FOUND);
  });

  it("should ignore FIND_VALUE answers", () => {
    // GIVEN
    const request = createRequest(p3.key, [p3]);
    request.start();

    // WHEN
    request.nextStep(peerAnswerFixture(OPERATION_ID, p3, p1));

    // THEN
    expect(request.getTotalStepsTaken()).toBe(0);
    expect(listener.onFindNodeResult).not.toHaveBeenCalled();
  });
});
