import type { Key } from "./key";

/**
 * Calculate the XOR distance between two keys.
 *
 * @returns The XOR of both keys, byte by byte (big-endian)
 */
export function calculateDistance(a: Key, b: Key): Uint8Array {
  const aBytes = a.getBytes();
  const bBytes = b.getBytes();
  const result = new Uint8Array(aBytes.length);

  for (let i = 0; i < aBytes.length; i++) {
    result[i] = aBytes[i] ^ bBytes[i];
  }

  return result;
}

/**
 * The XOR distance read as an unsigned integer. This is the value lookups
 * key their visited peers by.
 */
export function calculateScalarDistance(a: Key, b: Key): bigint {
  let result = 0n;
  for (const byte of calculateDistance(a, b)) {
    result = (result << 8n) | BigInt(byte);
  }
  return result;
}

/**
 * Compare how close two keys are to a target.
 *
 * @returns Negative if `a` is closer to `target` than `b`,
 *          positive if `b` is closer, zero if both are equally distant
 */
export function compareDistances(target: Key, a: Key, b: Key): number {
  const distanceA = calculateDistance(target, a);
  const distanceB = calculateDistance(target, b);

  for (let i = 0; i < distanceA.length; i++) {
    if (distanceA[i] !== distanceB[i]) {
      return distanceA[i] - distanceB[i];
    }
  }

  return 0;
}

/**
 * Position of the most significant differing bit, or -1 when the keys are
 * identical.
 */
export function log2Distance(a: Key, b: Key): number {
  const distance = calculateDistance(a, b);

  for (let i = 0; i < distance.length; i++) {
    if (distance[i] !== 0) {
      let byte = distance[i];
      let bitPosition = 0;

      while ((byte & 0x80) === 0 && bitPosition < 8) {
        byte <<= 1;
        bitPosition++;
      }

      return i * 8 + bitPosition;
    }
  }

  return -1;
}
