import { type Mock, beforeEach, describe, expect, it, vi } from "vitest";
import {
  createNodeProviderFixture,
  createPeerFixture,
} from "../__fixtures__/peers.fixture";
import type { PeerNode } from "../core";
import { LookupRounds, RoundStatus } from "./lookup-rounds";

describe("LookupRounds", () => {
  const [p1, p2, p3] = [1, 2, 3].map(createPeerFixture);
  const q1 = createPeerFixture(11);

  let sendRound: Mock<(peers: PeerNode[]) => void>;
  let nodeProvider: ReturnType<typeof createNodeProviderFixture>;
  let rounds: LookupRounds;

  beforeEach(() => {
    sendRound = vi.fn<(peers: PeerNode[]) => void>();
    nodeProvider = createNodeProviderFixture([p1, p2]);
    // p1 owns the target, it is at distance zero
    rounds = new LookupRounds(p1.key, 5, nodeProvider, sendRound);
  });

  it("should record the first round as awaited before sending it", () => {
    // GIVEN
    sendRound.mockImplementation(() => {
      expect(rounds.getAwaitingPeers()).toEqual([p1, p2]);
    });

    // WHEN
    const queried = rounds.begin();

    // THEN
    expect(queried).toEqual([p1, p2]);
    expect(sendRound).toHaveBeenCalledOnce();
    expect(rounds.getRound()).toBe(1);
  });

  it("should not send an empty round", () => {
    // GIVEN
    rounds = new LookupRounds(
      p1.key,
      5,
      createNodeProviderFixture([]),
      sendRound,
    );

    // THEN
    expect(rounds.begin()).toEqual([]);
    expect(sendRound).not.toHaveBeenCalled();
    expect(rounds.getRound()).toBe(0);
  });

  it("should treat a peer that was not asked as a stranger", () => {
    // GIVEN
    rounds.begin();

    // WHEN
    const sender = rounds.acceptAnswer(p3.address, 4);

    // THEN
    expect(sender).toEqual(p3);
    expect(rounds.isVisited(p3)).toBe(false);
    expect(rounds.getPendingFragments()).toBe(0);
    expect(nodeProvider.markVisited).not.toHaveBeenCalled();
  });

  it("should ignore candidates already visited", () => {
    // GIVEN
    rounds.begin();
    rounds.acceptAnswer(p2.address, 1);

    // WHEN
    rounds.offerCandidate(p2);
    rounds.offerCandidate(q1);

    // THEN
    expect(rounds.getCandidates()).toEqual([q1]);
  });

  it("should never count fragments below zero", () => {
    // WHEN
    rounds.consumeFragment();
    rounds.consumeFragment();

    // THEN
    expect(rounds.getPendingFragments()).toBe(0);
  });

  it("should drop silent peers when the round expires", () => {
    // GIVEN
    rounds.begin();
    rounds.acceptAnswer(p1.address, 3);

    // WHEN
    const dropped = rounds.expireRound();

    // THEN
    expect(dropped).toEqual([p2]);
    expect(rounds.getAwaitingPeers()).toEqual([]);
    expect(rounds.getPendingFragments()).toBe(0);
    expect(rounds.evaluate()).toBe(RoundStatus.EXHAUSTED);
  });

  it("should stay pending while fragments are outstanding", () => {
    // GIVEN
    rounds.begin();
    rounds.acceptAnswer(p1.address, 2);
    rounds.acceptAnswer(p2.address, 1);
    rounds.offerCandidate(q1);
    rounds.consumeFragment();

    // THEN
    expect(rounds.evaluate()).toBe(RoundStatus.PENDING);

    // WHEN
    rounds.consumeFragment();
    rounds.consumeFragment();

    // THEN
    expect(rounds.evaluate()).toBe(RoundStatus.NEXT_ROUND);
    expect(sendRound).toHaveBeenLastCalledWith([q1]);
    expect(rounds.getRound()).toBe(2);
  });

  it("should keep its candidates when the routing table fails", () => {
    // GIVEN
    const failure = new Error("routing table unavailable");
    nodeProvider.filterKClosest.mockImplementationOnce(() => {
      throw failure;
    });
    rounds.begin();
    rounds.expireRound();
    rounds.offerCandidate(q1);

    // WHEN
    expect(() => rounds.evaluate()).toThrow(failure);

    // THEN
    expect(rounds.getCandidates()).toEqual([q1]);
    expect(rounds.evaluate()).toBe(RoundStatus.NEXT_ROUND);
    expect(sendRound).toHaveBeenLastCalledWith([q1]);
  });

  it("should know the visited peer closest to the target", () => {
    // GIVEN
    rounds.begin();
    expect(rounds.closestVisited()).toBeNull();

    // WHEN
    rounds.acceptAnswer(p2.address, 1);
    rounds.acceptAnswer(p1.address, 1);

    // THEN
    expect(rounds.closestVisited()).toEqual(p1);
    expect(rounds.getVisitedPeers()[0]).toEqual(p1);
    expect(rounds.getVisitedPeers()).toHaveLength(2);
  });
});
