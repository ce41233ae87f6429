import { InvalidAddressError } from "../errors/kademlia-errors";
import { Key } from "./key";

/**
 * Network address of a peer, "host:port".
 */
export type PeerAddress = `${string}:${number}`;

/**
 * An abstract node of the overlay, identified by a key of type T.
 */
export interface Node<T> {
  keyLength(): number;

  getKey(): T;

  /**
   * Distance to another node, expressed in the key type itself.
   */
  getDistance(node: Node<T>): T;

  clone(): Node<T>;
}

const ADDRESS_PATTERN = /^(?<host>[^\s:]+|\[[0-9a-fA-F:.]+\]):(?<port>\d{1,5})$/;

/**
 * Check that a string is a "host:port" address with a valid port.
 */
export function isPeerAddress(value: string): value is PeerAddress {
  const match = ADDRESS_PATTERN.exec(value);
  if (!match?.groups) {
    return false;
  }

  const port = Number(match.groups.port);
  return port > 0 && port <= 65535;
}

/**
 * A node reachable on the network. Its key is derived from its address, so
 * two peers are the same peer when their addresses are; sorted collections
 * order them by key.
 */
export class PeerNode implements Node<Key> {
  readonly key: Key;
  readonly address: PeerAddress;

  constructor(address: PeerAddress) {
    this.address = address;
    this.key = Key.fromAddress(address);
  }

  /**
   * Decode a peer from the address carried in a message payload.
   * @throws InvalidAddressError if the payload is not "host:port"
   */
  static fromAddress(address: string): PeerNode {
    const trimmed = address.trim();
    if (!isPeerAddress(trimmed)) {
      throw new InvalidAddressError(address);
    }
    return new PeerNode(trimmed);
  }

  keyLength(): number {
    return Key.SIZE_IN_BITS;
  }

  getKey(): Key {
    return this.key;
  }

  getDistance(node: Node<Key>): Key {
    return this.key.xor(node.getKey());
  }

  clone(): PeerNode {
    return new PeerNode(this.address);
  }

  equals(other: PeerNode): boolean {
    return this.key.equals(other.key);
  }

  compareTo(other: PeerNode): number {
    return this.key.compareTo(other.key);
  }

  toString(): string {
    return `PeerNode(${this.address}, ${this.key.toHex()})`;
  }
}
