import {
  type Key,
  type PeerAddress,
  PeerNode,
  calculateScalarDistance,
} from "../core";
import type { NodeDataProvider } from "../routing";

/**
 * Where a lookup stands once a response has been taken into account.
 */
export enum RoundStatus {
  // Answers or fragments of the current round are still outstanding
  PENDING = "PENDING",
  // The round was complete and a new one has been sent
  NEXT_ROUND = "NEXT_ROUND",
  // The round was complete and no unvisited candidate is left
  EXHAUSTED = "EXHAUSTED",
}

/**
 * Round bookkeeping of an iterative lookup, shared by the lookup variants.
 *
 * It owns the peers visited so far (keyed by their distance to the target),
 * the peers of the current round that have not answered, the candidates
 * learned during the round and the number of answer fragments still
 * expected. `sendRound` is handed every new batch of peers to query, after
 * they are recorded as awaited.
 */
export class LookupRounds {
  private readonly target: Key;
  private readonly k: number;
  private readonly nodeProvider: NodeDataProvider;
  private readonly sendRound: (peers: PeerNode[]) => void;

  private readonly visited = new Map<bigint, PeerNode>();
  private readonly awaiting = new Map<PeerAddress, PeerNode>();
  private readonly candidates = new Map<PeerAddress, PeerNode>();
  private pendingFragments = 0;
  private round = 0;

  constructor(
    target: Key,
    k: number,
    nodeProvider: NodeDataProvider,
    sendRound: (peers: PeerNode[]) => void,
  ) {
    this.target = target;
    this.k = k;
    this.nodeProvider = nodeProvider;
    this.sendRound = sendRound;
  }

  /**
   * Query the k known peers closest to the target.
   * @returns The peers queried, empty when the routing table knows nobody
   */
  begin(): PeerNode[] {
    this.pendingFragments = 0;
    return this.query(this.nodeProvider.kClosest(this.k, this.target));
  }

  /**
   * Account for the sender of an answer. The first answer of an awaited
   * peer marks it visited and adds the fragments it announces; any later
   * one changes nothing here.
   *
   * @returns The sender as a peer
   */
  acceptAnswer(sender: PeerAddress, totalParts: number): PeerNode {
    const awaited = this.awaiting.get(sender);
    if (!awaited) {
      return new PeerNode(sender);
    }

    this.visited.set(this.distanceOf(awaited), awaited);
    this.nodeProvider.markVisited(awaited);
    this.awaiting.delete(sender);
    this.pendingFragments += totalParts;
    return awaited;
  }

  /**
   * Remember a peer learned from an answer, unless it was visited already.
   */
  offerCandidate(peer: PeerNode): void {
    if (!this.isVisited(peer)) {
      this.candidates.set(peer.address, peer);
    }
  }

  /**
   * One answer fragment has been handled. Never goes below zero, so a
   * repeated fragment can't keep the round open forever.
   */
  consumeFragment(): void {
    this.pendingFragments = Math.max(0, this.pendingFragments - 1);
  }

  /**
   * Treat every peer still awaited as unresponsive and forget the fragments
   * still expected. The caller is expected to {@link evaluate} next.
   */
  expireRound(): PeerNode[] {
    const dropped = [...this.awaiting.values()];
    this.awaiting.clear();
    this.pendingFragments = 0;
    return dropped;
  }

  /**
   * Decide whether the current round is over, and start the next one when
   * there are candidates left to query.
   */
  evaluate(): RoundStatus {
    if (this.awaiting.size > 0 || this.pendingFragments > 0) {
      return RoundStatus.PENDING;
    }

    // A candidate reported before it answered on its own is visited by now
    const fresh = [...this.candidates.values()].filter(
      (peer) => !this.isVisited(peer),
    );
    if (fresh.length === 0) {
      this.candidates.clear();
      return RoundStatus.EXHAUSTED;
    }

    // Candidates survive a failing routing table for the next evaluation
    const next = this.nodeProvider
      .filterKClosest(this.k, this.target, fresh)
      .filter((peer) => !this.isVisited(peer));
    this.candidates.clear();

    return this.query(next).length > 0
      ? RoundStatus.NEXT_ROUND
      : RoundStatus.EXHAUSTED;
  }

  isVisited(peer: PeerNode): boolean {
    return this.visited.get(this.distanceOf(peer))?.equals(peer) ?? false;
  }

  /**
   * The visited peer closest to the target, null before any answer.
   */
  closestVisited(): PeerNode | null {
    let closest: { distance: bigint; peer: PeerNode } | null = null;
    for (const [distance, peer] of this.visited) {
      if (closest === null || distance < closest.distance) {
        closest = { distance, peer };
      }
    }
    return closest?.peer ?? null;
  }

  getVisitedPeers(): PeerNode[] {
    return [...this.visited.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, peer]) => peer);
  }

  getAwaitingPeers(): PeerNode[] {
    return [...this.awaiting.values()];
  }

  getCandidates(): PeerNode[] {
    return [...this.candidates.values()];
  }

  getPendingFragments(): number {
    return this.pendingFragments;
  }

  /**
   * Number of rounds sent so far.
   */
  getRound(): number {
    return this.round;
  }

  private query(peers: PeerNode[]): PeerNode[] {
    const batch = [
      ...new Map(peers.map((peer) => [peer.address, peer])).values(),
    ].slice(0, this.k);
    if (batch.length === 0) {
      return batch;
    }

    for (const peer of batch) {
      this.awaiting.set(peer.address, peer);
    }
    this.round++;
    this.sendRound(batch);
    return batch;
  }

  private distanceOf(peer: PeerNode): bigint {
    return calculateScalarDistance(this.target, peer.key);
  }
}
