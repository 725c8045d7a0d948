/**
 * Outbound packet pipeline
 *
 * encode -> pad -> checksum -> running-key scramble (Init only) -> shim ->
 * encrypt (+ key rotation for Init) -> shim -> frame -> write.
 *
 * The frame is assembled in one buffer and handed to the transport in a
 * single write, a failed send never leaves a header on the wire.
 */

import { makeError } from '../errors.ts';
import { CIPHER_BLOCK_SIZE, type Crypt } from '../crypto/ciphers.ts';
import { type RandomSource, secureRandom } from '../crypto/random.ts';
import { cipherShim, scrambleInit } from '../crypto/scramble.ts';
import type { TransportSink } from '../adapters/types.ts';
import { type Mutex, SerialQueue } from '../utils/async.ts';
import { allocBytes, readInt32LE, writeInt16LE, writeInt32LE } from '../utils/binary.ts';
import { ByteWriter } from '../utils/cursor.ts';
import { BLOCK_SIZE, BUFFER_SIZE, CHECKSUM, HEADER_SIZE } from './constants.ts';
import { describeMessage, encodeServerMessage, type ServerMessage } from './messages.ts';
import { pad } from './utils.ts';

/**
 * Sends server messages to one client
 */
export interface PacketSender {
  send(msg: ServerMessage): Promise<void>;
}

/**
 * Packet sender configuration
 */
export interface AuthPacketSenderConfig {
  transport: TransportSink;
  /** Traffic crypt, shared with the inbound reader */
  crypt: Mutex<Crypt>;
  random?: RandomSource;
  /** Scratch buffer capacity, padded bodies must stay below it */
  bufferSize?: number;
  debug?: (msg: string) => void;
}

/**
 * Default packet sender.
 *
 * Reuses two scratch buffers for every packet; sends are serialized in call
 * order so concurrent callers never interleave inside them. The output
 * buffer holds the header followed by the encrypted body.
 */
export class AuthPacketSender implements PacketSender {
  private _transport: TransportSink;
  private _crypt: Mutex<Crypt>;
  private _random: RandomSource;
  private _debug?: (msg: string) => void;
  private _bufferSize: number;
  private _packet: Uint8Array;
  private _buffer: Uint8Array;
  private _queue = new SerialQueue();

  constructor(config: AuthPacketSenderConfig) {
    this._transport = config.transport;
    this._crypt = config.crypt;
    this._random = config.random ?? secureRandom;
    this._debug = config.debug;
    this._bufferSize = config.bufferSize ?? BUFFER_SIZE;
    this._packet = allocBytes(this._bufferSize);
    this._buffer = allocBytes(HEADER_SIZE + this._bufferSize);
  }

  send(msg: ServerMessage): Promise<void> {
    return this._queue.run(() => this._send(msg));
  }

  private async _send(msg: ServerMessage): Promise<void> {
    this._debug?.(`Outbound: Sending ${describeMessage(msg)}`);
    const newCryptKey = msg.type === 'init' ? msg.cryptKey.slice() : undefined;

    // Reset buffers for writing
    this._packet.fill(0);
    this._buffer.fill(0);

    const writer = new ByteWriter(this._packet);
    encodeServerMessage(msg, writer);
    let size = writer.position;

    // Checksum
    size = pad(size, BLOCK_SIZE, this._bufferSize);
    writeInt32LE(this._packet, CHECKSUM, size);
    size += BLOCK_SIZE;

    // Additional scramble for the first packet
    if (newCryptKey) {
      const key = readInt32LE(this._random.fill(allocBytes(4)), 0);
      size = pad(size, BLOCK_SIZE, this._bufferSize);
      scrambleInit(this._packet, size, key);
      size += BLOCK_SIZE;
    }

    // Encryption
    size = pad(size, BLOCK_SIZE, this._bufferSize);
    cipherShim(this._packet.subarray(0, size));
    size = pad(size, CIPHER_BLOCK_SIZE, this._bufferSize);
    const plainSize = size;
    size = await this._crypt.lock((crypt) => {
      const body = this._buffer.subarray(HEADER_SIZE);
      const written = crypt.encrypt(this._packet.subarray(0, plainSize), body);
      // Init itself goes out under the old key, everything after under the new one
      if (newCryptKey) {
        crypt.updateKey(newCryptKey);
        this._debug?.('Outbound: Traffic key rotated');
      }
      return written;
    });
    cipherShim(this._buffer.subarray(HEADER_SIZE, HEADER_SIZE + size));

    // Header
    size += HEADER_SIZE;
    writeInt16LE(this._buffer, size, 0);

    // Send
    try {
      await this._transport.write(this._buffer.slice(0, size));
      await this._transport.flush();
    } catch (err) {
      throw makeError(
        `Failed to send ${describeMessage(msg)}: ${err instanceof Error ? err.message : String(err)}`,
        'io',
        true,
        err,
      );
    }
  }
}
