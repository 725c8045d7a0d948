/**
 * Auth Protocol Constants
 */

/** Size of the packet header (total frame length, little-endian) */
export const HEADER_SIZE = 2;

/** Size of the buffers for IO, packet bodies cannot exceed this */
export const BUFFER_SIZE = 1024;

/** Size of the block for padding and the checksum/scramble words */
export const BLOCK_SIZE = 4;

/** Initial traffic key, used until the Init packet has been encrypted */
export const INIT_KEY: Uint8Array = new Uint8Array([
  0x6b, 0x60, 0xcb, 0x5b, 0x82, 0xce, 0x90, 0xb1,
  0xcc, 0x2b, 0x6c, 0x55, 0x6c, 0x6c, 0x6c, 0x6c,
]);

/** Length of the per-session traffic key */
export const TRAFFIC_KEY_SIZE = 16;

/** Protocol revision announced in the Init packet */
export const PROTOCOL_VERSION = 0xc621;

/** Session id sent in the Init packet at this stage */
export const SESSION_ID = 0x1eadbeef;

/** Checksum placeholder written after every packet body */
export const CHECKSUM = 0;

/** Server -> client packet ids */
export const SERVER_MESSAGE = {
  INIT: 0x00,
  GG_AUTH: 0x0b,
} as const;

/** Client -> server packet ids */
export const CLIENT_MESSAGE = {
  AUTH_GAME_GUARD: 0x07,
} as const;

/** GameGuard authentication result codes */
export const GG_AUTH_RESULT = {
  SKIP: 0x0b,
} as const;

export type GGAuthResult = (typeof GG_AUTH_RESULT)[keyof typeof GG_AUTH_RESULT];
