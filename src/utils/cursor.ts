/**
 * Seekable cursors over a fixed-size byte buffer
 *
 * Value names follow the legacy protocol's own vocabulary:
 * C = 1 byte, H = 2 bytes, D = 4 bytes, B = raw bytes.
 * All multi-byte values are little-endian and signed.
 */

import { makeError } from '../errors.ts';
import {
  readInt16LE,
  readInt32LE,
  readInt8,
  writeInt16LE,
  writeInt32LE,
  writeInt8,
} from './binary.ts';

/**
 * Writer for packet bodies
 */
export class ByteWriter {
  private _buf: Uint8Array;
  private _offset: number;

  constructor(buf: Uint8Array, offset = 0) {
    this._buf = buf;
    this._offset = offset;
  }

  get buffer(): Uint8Array {
    return this._buf;
  }

  get position(): number {
    return this._offset;
  }

  /** Bytes written so far */
  get written(): Uint8Array {
    return this._buf.subarray(0, this._offset);
  }

  /**
   * Move the cursor relative to its current position.
   * Skipped bytes keep whatever the buffer already holds.
   */
  seek(delta: number): this {
    this._ensure(delta);
    this._offset += delta;
    return this;
  }

  writeC(n: number): this {
    this._ensure(1);
    this._offset = writeInt8(this._buf, n, this._offset);
    return this;
  }

  writeH(n: number): this {
    this._ensure(2);
    this._offset = writeInt16LE(this._buf, n, this._offset);
    return this;
  }

  writeD(n: number): this {
    this._ensure(4);
    this._offset = writeInt32LE(this._buf, n, this._offset);
    return this;
  }

  writeB(bytes: Uint8Array): this {
    this._ensure(bytes.length);
    this._buf.set(bytes, this._offset);
    this._offset += bytes.length;
    return this;
  }

  private _ensure(len: number): void {
    const end = this._offset + len;
    if (end > this._buf.length || end < 0) {
      throw makeError(
        `Buffer size (${end}) exceeded limit (${this._buf.length})`,
        'encoding-overflow',
      );
    }
  }
}

/**
 * Reader for packet bodies
 */
export class ByteReader {
  private _buf: Uint8Array;
  private _offset: number;

  constructor(buf: Uint8Array, offset = 0) {
    this._buf = buf;
    this._offset = offset;
  }

  get position(): number {
    return this._offset;
  }

  get remain(): number {
    return this._buf.length - this._offset;
  }

  seek(delta: number): this {
    this._ensure(delta);
    this._offset += delta;
    return this;
  }

  readC(): number {
    this._ensure(1);
    const val = readInt8(this._buf, this._offset);
    this._offset += 1;
    return val;
  }

  readH(): number {
    this._ensure(2);
    const val = readInt16LE(this._buf, this._offset);
    this._offset += 2;
    return val;
  }

  readD(): number {
    this._ensure(4);
    const val = readInt32LE(this._buf, this._offset);
    this._offset += 4;
    return val;
  }

  /** Read `len` bytes (copied) */
  readB(len: number): Uint8Array {
    this._ensure(len);
    const val = this._buf.slice(this._offset, this._offset + len);
    this._offset += len;
    return val;
  }

  private _ensure(len: number): void {
    const end = this._offset + len;
    if (end > this._buf.length || end < 0) {
      throw makeError('Unexpected end of packet', 'io');
    }
  }
}
