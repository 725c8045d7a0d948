/**
 * Traffic cipher
 *
 * Blowfish in ECB mode with padding disabled. Callers are responsible for
 * block alignment (see {@link CIPHER_BLOCK_SIZE}) and for the legacy
 * byte-order shim around every call.
 */

import { Blowfish } from 'egoroof-blowfish';

/** Blowfish block size in bytes */
export const CIPHER_BLOCK_SIZE = 8;

/**
 * Paired encrypt/decrypt state sharing one key
 */
export interface Crypt {
  /** Encrypt `input` into `output`, returns the number of bytes written */
  encrypt(input: Uint8Array, output: Uint8Array): number;
  /** Decrypt `input` into `output`, returns the number of bytes written */
  decrypt(input: Uint8Array, output: Uint8Array): number;
  /** Re-key both directions */
  updateKey(key: Uint8Array): void;
}

/**
 * Blowfish-ECB traffic crypt.
 *
 * Holds one instance per direction. Re-keying builds both replacements
 * before swapping either in, so the two directions never disagree on the key.
 */
export class BlowfishCrypt implements Crypt {
  private _encrypt: Blowfish;
  private _decrypt: Blowfish;

  constructor(key: Uint8Array) {
    const [enc, dec] = createPair(key);
    this._encrypt = enc;
    this._decrypt = dec;
  }

  encrypt(input: Uint8Array, output: Uint8Array): number {
    assertAligned(input, output);
    // Hand the library an owned copy, never a view into a scratch buffer
    const encoded = this._encrypt.encode(input.slice());
    output.set(encoded.subarray(0, input.length));
    return input.length;
  }

  decrypt(input: Uint8Array, output: Uint8Array): number {
    assertAligned(input, output);
    const decoded = this._decrypt.decode(input.slice(), Blowfish.TYPE.UINT8_ARRAY);
    if (!(decoded instanceof Uint8Array)) {
      throw new TypeError('Blowfish decode returned a string');
    }
    // NULL padding strips trailing zero bytes from the last block; the
    // output region is zeroed first so those bytes come back as zeros.
    output.fill(0, 0, input.length);
    output.set(decoded.subarray(0, input.length));
    return input.length;
  }

  updateKey(key: Uint8Array): void {
    const [enc, dec] = createPair(key);
    this._encrypt = enc;
    this._decrypt = dec;
  }
}

function createPair(key: Uint8Array): [Blowfish, Blowfish] {
  const raw = key.slice();
  return [
    new Blowfish(raw, Blowfish.MODE.ECB, Blowfish.PADDING.NULL),
    new Blowfish(raw, Blowfish.MODE.ECB, Blowfish.PADDING.NULL),
  ];
}

function assertAligned(input: Uint8Array, output: Uint8Array): void {
  if (input.length % CIPHER_BLOCK_SIZE !== 0) {
    throw new RangeError(
      `Cipher input (${input.length}) is not a multiple of ${CIPHER_BLOCK_SIZE}`,
    );
  }
  if (output.length < input.length) {
    throw new RangeError(`Cipher output (${output.length}) smaller than input (${input.length})`);
  }
}
