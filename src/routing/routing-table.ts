import debug from "debug";
import { Key, type PeerNode, calculateScalarDistance } from "../core";
import { BoundedMaxHeap } from "../utils/max-heap";
import { KBucket } from "./k-bucket";
import type { NodeDataProvider } from "./node-data-provider";

const log = debug("kad:routing");

export type RoutingTableOptions = {
  /**
   * the bucket size (K) from the Kademlia paper
   * this is the maximum number of peers that can be stored in a bucket
   */
  k?: number;

  /**
   * the number of peers to ping when a bucket becomes full and a new peer wants to be added.
   * these are taken from the least recently seen peers in the bucket
   */
  pingCount?: number;
};

/**
 * In-memory routing table: one k-bucket per bit of the key space, bucket i
 * holding the peers whose most significant differing bit with the local key
 * is bit i (counting from the least significant end).
 *
 * Every call runs to completion without yielding, so concurrent lookups
 * driven from the same event loop share it safely.
 */
export class RoutingTable implements NodeDataProvider {
  private readonly localKey: Key;
  private readonly buckets: KBucket[];

  constructor(localKey: Key, options: RoutingTableOptions = {}) {
    this.localKey = localKey;
    this.buckets = Array.from(
      { length: Key.SIZE_IN_BITS },
      () => new KBucket({ k: options.k, pingCount: options.pingCount }),
    );
  }

  getLocalKey(): Key {
    return this.localKey;
  }

  /**
   * Add a peer to the routing table.
   * @returns List of peers that should be pinged if the bucket is full
   */
  addNode(peer: PeerNode): PeerNode[] {
    const bucket = this.bucketFor(peer.key);
    if (!bucket) {
      return [];
    }

    const nodesToPing = bucket.addNode(peer);
    if (nodesToPing.length > 0) {
      log(`bucket full, ${peer.address} not added`);
    }
    return nodesToPing;
  }

  /**
   * @returns true if the peer was removed, false if it was not found
   */
  removeNode(key: Key): boolean {
    return this.bucketFor(key)?.removeNode(key) ?? false;
  }

  findNode(key: Key): PeerNode | undefined {
    return this.bucketFor(key)?.findNode(key);
  }

  getLastSeen(key: Key): number | undefined {
    return this.bucketFor(key)?.getLastSeen(key);
  }

  getAllNodes(): PeerNode[] {
    return this.buckets.flatMap((bucket) => bucket.getAllNodes());
  }

  size(): number {
    return this.buckets.reduce((total, bucket) => total + bucket.size(), 0);
  }

  kClosest(k: number, target: Key): PeerNode[] {
    return this.filterKClosest(k, target, this.getAllNodes());
  }

  filterKClosest(k: number, target: Key, candidates: PeerNode[]): PeerNode[] {
    const heap = new BoundedMaxHeap<PeerNode>(k, (peer) => peer.key.toHex());
    for (const peer of candidates) {
      heap.offer(calculateScalarDistance(target, peer.key), peer);
    }
    return heap.sortedValues();
  }

  /**
   * A peer that answered is alive: refresh it, or learn it if it is new.
   */
  markVisited(peer: PeerNode): void {
    this.addNode(peer);
  }

  private bucketFor(key: Key): KBucket | undefined {
    const index = this.localKey.getBucketIndex(key);
    return index === -1 ? undefined : this.buckets[index];
  }
}
