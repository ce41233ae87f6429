import type { Key, PeerNode } from "../core";

/**
 * What lookups need from a routing table. The table is shared between
 * every running lookup; an implementation used from several execution
 * contexts has to serialize access itself.
 */
export interface NodeDataProvider {
  /**
   * The k known peers closest to a target, closest first.
   * @param k Maximum number of peers to return
   * @param target The key peers are ranked against
   */
  kClosest(k: number, target: Key): PeerNode[];

  /**
   * The k peers of `candidates` closest to a target, closest first.
   */
  filterKClosest(k: number, target: Key, candidates: PeerNode[]): PeerNode[];

  /**
   * Record that a peer answered a lookup.
   */
  markVisited(peer: PeerNode): void;
}
