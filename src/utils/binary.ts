/**
 * Binary utilities for working with Uint8Array
 *
 * The legacy wire format is little-endian throughout, so only the
 * little-endian helpers the protocol needs live here.
 */

/** Allocate a zero-filled Uint8Array of the given size */
export function allocBytes(size: number): Uint8Array {
  return new Uint8Array(size);
}

/** Create Uint8Array from a hex string */
export function fromHex(hex: string): Uint8Array {
  const len = hex.length / 2;
  const bytes = new Uint8Array(len);
  for (let i = 0; i < len; i++) {
    bytes[i] = parseInt(hex.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/** Create Uint8Array from a base64url string (no padding required) */
export function fromBase64Url(base64url: string): Uint8Array {
  let base64 = base64url.replace(/-/g, '+').replace(/_/g, '/');
  while (base64.length % 4 !== 0) {
    base64 += '=';
  }
  const binary = atob(base64);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

/** Concatenate multiple Uint8Arrays into one */
export function concatBytes(arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/** Convert Uint8Array to hex string */
export function toHex(bytes: Uint8Array): string {
  let hex = '';
  for (let i = 0; i < bytes.length; i++) {
    hex += bytes[i].toString(16).padStart(2, '0');
  }
  return hex;
}

/** Read signed 8-bit integer */
export function readInt8(buf: Uint8Array, offset: number): number {
  const val = buf[offset];
  return val > 0x7f ? val - 0x100 : val;
}

/** Write 8-bit integer (signed or unsigned), returns new offset */
export function writeInt8(buf: Uint8Array, value: number, offset: number): number {
  buf[offset] = value & 0xff;
  return offset + 1;
}

/** Read signed 16-bit little-endian integer */
export function readInt16LE(buf: Uint8Array, offset: number): number {
  const val = buf[offset] + (buf[offset + 1] << 8);
  return val > 0x7fff ? val - 0x10000 : val;
}

/** Read unsigned 16-bit little-endian integer */
export function readUInt16LE(buf: Uint8Array, offset: number): number {
  return buf[offset] + (buf[offset + 1] << 8);
}

/** Write 16-bit little-endian integer (signed or unsigned), returns new offset */
export function writeInt16LE(buf: Uint8Array, value: number, offset: number): number {
  buf[offset] = value & 0xff;
  buf[offset + 1] = (value >>> 8) & 0xff;
  return offset + 2;
}

/** Read signed 32-bit little-endian integer */
export function readInt32LE(buf: Uint8Array, offset: number): number {
  return (
    buf[offset] |
    (buf[offset + 1] << 8) |
    (buf[offset + 2] << 16) |
    (buf[offset + 3] << 24)
  );
}

/** Write 32-bit little-endian integer (signed or unsigned), returns new offset */
export function writeInt32LE(buf: Uint8Array, value: number, offset: number): number {
  buf[offset] = value & 0xff;
  buf[offset + 1] = (value >>> 8) & 0xff;
  buf[offset + 2] = (value >>> 16) & 0xff;
  buf[offset + 3] = (value >>> 24) & 0xff;
  return offset + 4;
}
