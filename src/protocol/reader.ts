/**
 * Inbound packet pipeline
 *
 * Reassembles `[H size][body]` frames from arbitrary transport chunks,
 * decrypts each body under the shared traffic crypt and decodes it.
 */

import { makeError } from '../errors.ts';
import { CIPHER_BLOCK_SIZE, type Crypt } from '../crypto/ciphers.ts';
import { cipherShim } from '../crypto/scramble.ts';
import { type Mutex, SerialQueue } from '../utils/async.ts';
import { allocBytes, readUInt16LE } from '../utils/binary.ts';
import { ByteReader } from '../utils/cursor.ts';
import { BUFFER_SIZE, HEADER_SIZE } from './constants.ts';
import { type ClientMessage, decodeClientMessage, describeMessage } from './messages.ts';

/**
 * Packet reader configuration
 */
export interface AuthPacketReaderConfig {
  /** Traffic crypt, shared with the packet sender */
  crypt: Mutex<Crypt>;
  onMessage: (msg: ClientMessage) => void | Promise<void>;
  debug?: (msg: string) => void;
}

/**
 * Default inbound packet reader
 */
export class AuthPacketReader {
  private _crypt: Mutex<Crypt>;
  private _onMessage: (msg: ClientMessage) => void | Promise<void>;
  private _debug?: (msg: string) => void;
  private _queue = new SerialQueue();

  private _len = 0;
  private _lenBuf = allocBytes(HEADER_SIZE);
  private _lenPos = 0;
  private _packet: Uint8Array | null = null;
  private _packetPos = 0;

  constructor(config: AuthPacketReaderConfig) {
    this._crypt = config.crypt;
    this._onMessage = config.onMessage;
    this._debug = config.debug;
  }

  /**
   * Feed received bytes. Complete frames are decrypted, decoded and
   * dispatched before the returned promise resolves.
   */
  push(data: Uint8Array): Promise<void> {
    // Copy, the caller may reuse its buffer
    const chunk = data.slice();
    return this._queue.run(() => this._process(chunk));
  }

  private async _process(data: Uint8Array): Promise<void> {
    let p = 0;
    while (p < data.length) {
      // Read frame length (2 bytes, little-endian, includes itself)
      if (this._lenPos < HEADER_SIZE) {
        while (this._lenPos < HEADER_SIZE && p < data.length) {
          this._lenBuf[this._lenPos++] = data[p++];
        }
        if (this._lenPos < HEADER_SIZE) return;

        this._len = readUInt16LE(this._lenBuf, 0) - HEADER_SIZE;
        if (
          this._len <= 0 ||
          this._len >= BUFFER_SIZE ||
          this._len % CIPHER_BLOCK_SIZE !== 0
        ) {
          throw makeError(`Bad packet length (${this._len + HEADER_SIZE})`, 'malformed-input', true);
        }
        this._packet = allocBytes(this._len);
        this._packetPos = 0;
      }

      const packet = this._packet;
      if (!packet) return;

      const nb = Math.min(this._len - this._packetPos, data.length - p);
      packet.set(data.subarray(p, p + nb), this._packetPos);
      p += nb;
      this._packetPos += nb;
      if (this._packetPos < this._len) return;

      // Prepare for next packet
      this._lenPos = 0;
      this._packet = null;
      this._packetPos = 0;

      await this._dispatch(packet);
    }
  }

  private async _dispatch(packet: Uint8Array): Promise<void> {
    const body = allocBytes(packet.length);
    cipherShim(packet);
    const size = await this._crypt.lock((crypt) => crypt.decrypt(packet, body));
    cipherShim(body.subarray(0, size));

    const msg = decodeClientMessage(new ByteReader(body.subarray(0, size)));
    this._debug?.(`Inbound: Received ${describeMessage(msg)}`);
    await this._onMessage(msg);
  }
}
