/**
 * Key is the fixed-width identifier of the overlay: a peer's address in the
 * key space and the coordinate used by the XOR metric.
 * Keys are 128 bits wide and immutable.
 */
import { createHash, randomBytes } from "node:crypto";
import bs58 from "bs58";
import { InvalidKeyError } from "../errors/kademlia-errors";

export const HEX_PREFIX = "0x" as const;

export class Key {
  // The actual bytes of the key, never exposed directly
  private readonly bytes: Uint8Array;
  // 128 bits = 16 bytes
  public static readonly SIZE_IN_BYTES = 16 as const;
  public static readonly SIZE_IN_BITS = Key.SIZE_IN_BYTES * 8;

  /**
   * Create a new Key from its raw bytes.
   * @param bytes Exactly {@link Key.SIZE_IN_BYTES} bytes.
   */
  constructor(bytes: Uint8Array) {
    if (bytes.length !== Key.SIZE_IN_BYTES) {
      throw new InvalidKeyError(
        `Key must be ${Key.SIZE_IN_BYTES} bytes long, got ${bytes.length}`,
      );
    }

    // Copy so the caller's buffer can't alter the key
    this.bytes = new Uint8Array(bytes);
  }

  /**
   * Generate a uniformly distributed random key.
   */
  static random(): Key {
    return new Key(new Uint8Array(randomBytes(Key.SIZE_IN_BYTES)));
  }

  /**
   * Derive the key of a peer from its network address.
   * SHA-256 of the address, truncated to the key width.
   */
  static fromAddress(address: string): Key {
    const digest = createHash("sha256").update(address).digest();
    return new Key(new Uint8Array(digest.subarray(0, Key.SIZE_IN_BYTES)));
  }

  /**
   * Create a Key from a hex string, with or without the `0x` prefix.
   */
  static fromHex(hex: string): Key {
    const trimHex = hex.startsWith(HEX_PREFIX) ? hex.slice(2) : hex;

    if (!/^[0-9a-fA-F]+$/.test(trimHex)) {
      throw new InvalidKeyError(
        "Invalid hex string, must contain only 0-9, a-f, A-F",
      );
    }

    if (trimHex.length !== Key.SIZE_IN_BYTES * 2) {
      throw new InvalidKeyError(
        `Key must be ${Key.SIZE_IN_BYTES * 2} hex characters long`,
      );
    }

    const bytes = new Uint8Array(Key.SIZE_IN_BYTES);
    for (let i = 0; i < Key.SIZE_IN_BYTES; i++) {
      bytes[i] = Number.parseInt(trimHex.substring(i * 2, i * 2 + 2), 16);
    }

    return new Key(bytes);
  }

  /**
   * Create a Key from its base58 form.
   */
  static fromBase58(base58String: string): Key {
    let bytes: Uint8Array;
    try {
      bytes = bs58.decode(base58String);
    } catch (error) {
      throw new InvalidKeyError(
        `Invalid Base58 string: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (bytes.length !== Key.SIZE_IN_BYTES) {
      throw new InvalidKeyError(
        `Invalid Base58 string: expected ${Key.SIZE_IN_BYTES} bytes but got ${bytes.length}`,
      );
    }

    return new Key(bytes);
  }

  /**
   * Build a key from an unsigned integer, mostly useful to lay out keys at
   * known distances from each other.
   */
  static fromBigInt(value: bigint): Key {
    if (value < 0n || value >= 1n << BigInt(Key.SIZE_IN_BITS)) {
      throw new InvalidKeyError(
        `Value does not fit in ${Key.SIZE_IN_BITS} unsigned bits`,
      );
    }

    const bytes = new Uint8Array(Key.SIZE_IN_BYTES);
    let remaining = value;
    for (let i = Key.SIZE_IN_BYTES - 1; i >= 0; i--) {
      bytes[i] = Number(remaining & 0xffn);
      remaining >>= 8n;
    }

    return new Key(bytes);
  }

  getBytes(): Uint8Array {
    return new Uint8Array(this.bytes);
  }

  toHex(): string {
    return Array.from(this.bytes)
      .map((b) => b.toString(16).padStart(2, "0"))
      .join("");
  }

  toBase58(): string {
    return bs58.encode(this.bytes);
  }

  /**
   * Read the key as a big-endian unsigned integer.
   */
  toBigInt(): bigint {
    let result = 0n;
    for (const byte of this.bytes) {
      result = (result << 8n) | BigInt(byte);
    }
    return result;
  }

  /**
   * Bitwise XOR with another key. The result is itself a key, which is how
   * the overlay represents a distance.
   */
  xor(other: Key): Key {
    const result = new Uint8Array(Key.SIZE_IN_BYTES);
    for (let i = 0; i < Key.SIZE_IN_BYTES; i++) {
      result[i] = this.bytes[i] ^ other.bytes[i];
    }
    return new Key(result);
  }

  /**
   * Get the bit at a position, 0 being the most significant.
   */
  getBit(index: number): boolean {
    if (index < 0 || index >= Key.SIZE_IN_BITS) {
      throw new InvalidKeyError(
        `Bit position must be between 0 and ${Key.SIZE_IN_BITS - 1}`,
      );
    }

    const byteIndex = Math.floor(index / 8);
    const bitIndex = index % 8;

    return (this.bytes[byteIndex] & (1 << (7 - bitIndex))) !== 0;
  }

  /**
   * Number of leading bits shared with another key.
   */
  commonPrefixLength(other: Key): number {
    let prefixLength = 0;

    for (let i = 0; i < Key.SIZE_IN_BYTES; i++) {
      if (this.bytes[i] !== other.bytes[i]) {
        const xor = this.bytes[i] ^ other.bytes[i];

        let mask = 0x80;
        while (mask > 0 && (xor & mask) === 0) {
          prefixLength++;
          mask >>= 1;
        }

        return prefixLength;
      }

      prefixLength += 8;
    }

    return prefixLength;
  }

  /**
   * Index of the k-bucket another key falls in, relative to this key.
   * -1 for the key itself.
   */
  getBucketIndex(other: Key): number {
    if (this.equals(other)) {
      return -1;
    }

    return Key.SIZE_IN_BITS - 1 - this.commonPrefixLength(other);
  }

  /**
   * Total order on keys, reading them as unsigned big-endian integers.
   */
  compareTo(other: Key): number {
    for (let i = 0; i < Key.SIZE_IN_BYTES; i++) {
      if (this.bytes[i] !== other.bytes[i]) {
        return this.bytes[i] - other.bytes[i];
      }
    }
    return 0;
  }

  equals(other: Key): boolean {
    return this.bytes.every((value, index) => value === other.bytes[index]);
  }

  toString(): string {
    return `Key(${HEX_PREFIX}${this.toHex()})`;
  }
}
