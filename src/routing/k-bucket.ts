import type { Key, PeerNode } from "../core";

export type KBucketOptions = {
  /**
   * The bucket size parameter (k) from the Kademlia paper.
   * This is the maximum number of peers that can be stored in a bucket.
   */
  k?: number;

  /**
   * The number of peers to ping when the bucket is full and a new peer
   * wants in. These are taken from the least recently seen ones.
   */
  pingCount?: number;
};

type BucketEntry = {
  peer: PeerNode;
  lastSeen: number;
};

/**
 * A list of at most k peers, least recently seen first.
 */
export class KBucket {
  private static readonly DEFAULT_K = 20 as const;
  private static readonly DEFAULT_PING_COUNT = 3 as const;

  private readonly k: number;
  private readonly pingCount: number;

  // least recently seen first
  private entries: BucketEntry[] = [];

  constructor(options: KBucketOptions = {}) {
    this.k = options.k ?? KBucket.DEFAULT_K;
    this.pingCount = options.pingCount ?? KBucket.DEFAULT_PING_COUNT;
  }

  getAllNodes(): PeerNode[] {
    return this.entries.map((entry) => entry.peer);
  }

  size(): number {
    return this.entries.length;
  }

  isFull(): boolean {
    return this.size() >= this.k;
  }

  findNode(key: Key): PeerNode | undefined {
    return this.entries.find((entry) => entry.peer.key.equals(key))?.peer;
  }

  /**
   * When the peer was last seen, undefined if it is not in the bucket.
   */
  getLastSeen(key: Key): number | undefined {
    return this.entries.find((entry) => entry.peer.key.equals(key))?.lastSeen;
  }

  /**
   * Refresh a peer's lastSeen and move it to the tail.
   * @returns false if the peer is not in the bucket
   */
  touch(key: Key, now = Date.now()): boolean {
    const index = this.entries.findIndex((entry) => entry.peer.key.equals(key));
    if (index === -1) {
      return false;
    }

    const [entry] = this.entries.splice(index, 1);
    entry.lastSeen = now;
    this.entries.push(entry);
    return true;
  }

  /**
   * Add a peer, or refresh it if it is already known.
   *
   * @returns The least recently seen peers to ping if the bucket is full
   *          (the peer was not added), an empty array otherwise
   */
  addNode(peer: PeerNode, now = Date.now()): PeerNode[] {
    if (this.touch(peer.key, now)) {
      return [];
    }

    if (!this.isFull()) {
      this.entries.push({ peer, lastSeen: now });
      return [];
    }

    return this.entries.slice(0, this.pingCount).map((entry) => entry.peer);
  }

  /**
   * @returns true if the peer was removed
   */
  removeNode(key: Key): boolean {
    const originalSize = this.size();
    this.entries = this.entries.filter((entry) => !entry.peer.key.equals(key));
    return this.size() < originalSize;
  }
}
