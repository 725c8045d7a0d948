/**
 * Test Helpers
 *
 * In-memory transport, deterministic key sources and frame helpers.
 */

import type { Transport } from '../src/adapters/types.ts';
import { BlowfishCrypt } from '../src/crypto/ciphers.ts';
import type { RandomSource } from '../src/crypto/random.ts';
import { cipherShim } from '../src/crypto/scramble.ts';
import type { CredentialKeyPair, KeypairGenerator } from '../src/keygen.ts';
import { HEADER_SIZE } from '../src/protocol/constants.ts';
import { deferred, type Deferred } from '../src/utils/async.ts';
import { fromHex, readInt32LE, writeInt16LE, writeInt32LE } from '../src/utils/binary.ts';

/** 128-byte modulus used throughout the tests (bytes `(i * 37 + 11) & 0xff`) */
export const TEST_MODULUS_HEX =
  '0b30557a9fc4e90e33587da2c7ec11365b80a5caef14395e83a8cdf2173c6186' +
  'abd0f51a3f6489aed3f81d42678cb1d6fb20456a8fb4d9fe23486d92b7dc0126' +
  '4b7095badf04294e7398bde2072c51769bc0e50a2f54799ec3e80d32577ca1c6' +
  'eb10355a7fa4c9ee13385d82a7ccf1163b6085aacff4193e6388add2f71c4166';

/** {@link TEST_MODULUS_HEX} after the modulus scramble */
export const TEST_MODULUS_SCRAMBLED_HEX =
  '6721e32140c0c04040c0c040c0a761a3e14040c0c04040c04040c0c04040c040' +
  '40c0c04040c04040c0c040c0c04040c0c040c0c04040c0c040c0c04040c04040' +
  '2c51769b9fc4e90e33587da2c7ac51f69b80a5caef14395e83a8cdf2173c6186' +
  'abd0f51a3f6489aed3f81d42678cb1d6fb20456a8fb4d9fe23486d92b7dc0126';

/** Traffic key used by tests that build messages directly */
export const TEST_CRYPT_KEY_HEX = 'a0a1a2a3a4a5a6a7a8a9aaabacadaeaf';

export function testModulus(): Uint8Array {
  return fromHex(TEST_MODULUS_HEX);
}

/**
 * Random source yielding 1, 2, 3, ... (wrapping at 256) across calls
 */
export function countingRandom(): RandomSource & { calls: number } {
  let next = 1;
  const source = {
    calls: 0,
    fill(buffer: Uint8Array): Uint8Array {
      source.calls++;
      for (let i = 0; i < buffer.length; i++) {
        buffer[i] = next & 0xff;
        next++;
      }
      return buffer;
    },
  };
  return source;
}

/**
 * Key generator returning a fixed modulus
 */
export function staticKeygen(modulus: Uint8Array = testModulus()): KeypairGenerator {
  const pair: CredentialKeyPair = {
    bits: modulus.length * 8,
    modulus,
    publicExponent: new Uint8Array([0x01, 0x00, 0x01]),
    privateExponent: new Uint8Array(modulus.length),
  };
  return { generate: async () => pair };
}

/**
 * Transport keeping everything in memory
 */
export class MemoryTransport implements Transport {
  readonly writes: Uint8Array[] = [];
  flushes = 0;
  failWith?: Error;

  private _closed = false;
  private _ended = false;
  private _inbound: Uint8Array[] = [];
  private _readWaiter: Deferred<void> | null = null;
  private _writeWaiters: Array<{ count: number; wait: Deferred<void> }> = [];
  private _flushWaiters: Array<{ count: number; wait: Deferred<void> }> = [];

  get readable(): AsyncIterable<Uint8Array> {
    return this._read();
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.writes.push(data.slice());
    this._writeWaiters = release(this._writeWaiters, this.writes.length);
  }

  async flush(): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.flushes++;
    this._flushWaiters = release(this._flushWaiters, this.flushes);
  }

  close(): void {
    this._closed = true;
    this.end();
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Deliver bytes to the reading side */
  push(data: Uint8Array): void {
    this._inbound.push(data);
    this._wakeReader();
  }

  /** Signal end of the inbound stream */
  end(): void {
    this._ended = true;
    this._wakeReader();
  }

  /** Resolve once at least `count` writes have been recorded */
  waitForWrites(count: number): Promise<void> {
    if (this.writes.length >= count) {
      return Promise.resolve();
    }
    const wait = deferred<void>();
    this._writeWaiters.push({ count, wait });
    return wait.promise;
  }

  /**
   * Resolve once at least `count` flushes have completed and every
   * continuation queued behind them has run
   */
  async waitForFlushes(count: number): Promise<void> {
    if (this.flushes < count) {
      const wait = deferred<void>();
      this._flushWaiters.push({ count, wait });
      await wait.promise;
    }
    await new Promise<void>((resolve) => setImmediate(resolve));
  }

  private _wakeReader(): void {
    const waiter = this._readWaiter;
    if (waiter) {
      this._readWaiter = null;
      waiter.resolve();
    }
  }

  private async *_read(): AsyncIterableIterator<Uint8Array> {
    while (true) {
      const next = this._inbound.shift();
      if (next) {
        yield next;
        continue;
      }
      if (this._ended) return;
      this._readWaiter = deferred<void>();
      await this._readWaiter.promise;
    }
  }
}

function release(
  waiters: Array<{ count: number; wait: Deferred<void> }>,
  reached: number,
): Array<{ count: number; wait: Deferred<void> }> {
  return waiters.filter((waiter) => {
    if (reached >= waiter.count) {
      waiter.wait.resolve();
      return false;
    }
    return true;
  });
}

/**
 * Decrypt a frame's body under `key` and undo the byte-order shim
 */
export function openFrame(frame: Uint8Array, key: Uint8Array): Uint8Array {
  const body = cipherShim(frame.slice(HEADER_SIZE));
  const plain = new Uint8Array(body.length);
  new BlowfishCrypt(key).decrypt(body, plain);
  return cipherShim(plain);
}

/**
 * Build a client frame: shim, encrypt under `key`, shim, prepend header
 */
export function sealFrame(plain: Uint8Array, key: Uint8Array): Uint8Array {
  const body = cipherShim(plain.slice());
  const encrypted = new Uint8Array(body.length);
  new BlowfishCrypt(key).encrypt(body, encrypted);
  cipherShim(encrypted);

  const frame = new Uint8Array(HEADER_SIZE + encrypted.length);
  writeInt16LE(frame, frame.length, 0);
  frame.set(encrypted, HEADER_SIZE);
  return frame;
}

/**
 * Undo the running-key scramble given the trailer position
 */
export function unscrambleInit(buf: Uint8Array, size: number): Uint8Array {
  const out = buf.slice();
  let key = readInt32LE(out, size);
  for (let pos = size - 4; pos >= 4; pos -= 4) {
    const word = readInt32LE(out, pos) ^ key;
    writeInt32LE(out, word, pos);
    key = (key - word) | 0;
  }
  return out;
}
