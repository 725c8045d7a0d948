/**
 * Cryptographically secure random number generation
 */

import { webcrypto } from 'node:crypto';

/**
 * Source of random bytes.
 *
 * Injected wherever key material or scramble seeds are drawn so tests can
 * substitute a deterministic source.
 */
export interface RandomSource {
  /** Fill `buffer` with random bytes and return it */
  fill(buffer: Uint8Array): Uint8Array;
}

/**
 * Generate cryptographically secure random bytes.
 */
export function randomBytes(size: number): Uint8Array {
  const bytes = new Uint8Array(size);
  webcrypto.getRandomValues(bytes);
  return bytes;
}

/**
 * Fill a Uint8Array with cryptographically secure random bytes.
 */
export function randomFill(buffer: Uint8Array, offset: number = 0, size?: number): Uint8Array {
  const end = size !== undefined ? offset + size : buffer.length;
  const view = buffer.subarray(offset, end);
  webcrypto.getRandomValues(view);
  return buffer;
}

/** Default {@link RandomSource} backed by Web Crypto */
export const secureRandom: RandomSource = {
  fill: (buffer) => randomFill(buffer),
};
