/**
 * Legacy scrambles
 *
 * Byte-level obfuscations the legacy client expects on top of (and around)
 * the Blowfish cipher. All functions work in place and are pure with respect
 * to everything but the buffer they are given.
 */

import { readInt32LE, writeInt32LE } from '../utils/binary.ts';

/** Size of the block the running-key scramble and cipher shim operate on */
const WORD_SIZE = 4;

/** Length of the RSA modulus the client expects */
export const MODULUS_SIZE = 128;

/**
 * Scramble the RSA modulus used for username/password encryption.
 *
 * Step order matters, each loop reads what the previous one wrote.
 */
export function scrambleModulus(modulus: Uint8Array): Uint8Array {
  if (modulus.length !== MODULUS_SIZE) {
    throw new RangeError(`Modulus must be ${MODULUS_SIZE} bytes, got ${modulus.length}`);
  }

  for (let i = 0; i < 4; i++) {
    const tmp = modulus[i];
    modulus[i] = modulus[i + 77];
    modulus[i + 77] = tmp;
  }
  for (let i = 0; i < 64; i++) {
    modulus[i] ^= modulus[i + 64];
  }
  for (let i = 0; i < 4; i++) {
    modulus[i + 13] ^= modulus[i + 52];
  }
  for (let i = 0; i < 64; i++) {
    modulus[i + 64] ^= modulus[i];
  }
  return modulus;
}

/**
 * Running-key scramble applied to the first packet of a session.
 *
 * Every 4-byte word in `[4, size)` is added to the key (wrapping int32,
 * using the word's original value) and then XORed with it. The final key is
 * appended as a trailing word at `size`, so `buf` must hold `size + 4` bytes.
 *
 * @returns the final key written at `size`
 */
export function scrambleInit(buf: Uint8Array, size: number, key: number): number {
  if (size + WORD_SIZE > buf.length) {
    throw new RangeError(`Scramble trailer at ${size} exceeds buffer (${buf.length})`);
  }

  let acc = key | 0;
  for (let pos = WORD_SIZE; pos < size; pos += WORD_SIZE) {
    const word = readInt32LE(buf, pos);
    acc = (acc + word) | 0;
    writeInt32LE(buf, word ^ acc, pos);
  }
  writeInt32LE(buf, acc, size);
  return acc;
}

/**
 * Byte-order shim around the cipher.
 *
 * The legacy client feeds Blowfish little-endian words; reversing each
 * 4-byte group before and after a standard big-endian implementation gives
 * the same result. Trailing bytes that do not fill a group are left alone.
 * Self-inverse.
 */
export function cipherShim(buf: Uint8Array): Uint8Array {
  const end = buf.length - (buf.length % WORD_SIZE);
  for (let i = 0; i < end; i += WORD_SIZE) {
    let tmp = buf[i];
    buf[i] = buf[i + 3];
    buf[i + 3] = tmp;
    tmp = buf[i + 1];
    buf[i + 1] = buf[i + 2];
    buf[i + 2] = tmp;
  }
  return buf;
}
