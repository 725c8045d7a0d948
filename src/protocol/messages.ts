/**
 * Auth message model
 *
 * Closed set of messages exchanged before login: the server's Init and
 * GameGuard reply, and the client's GameGuard request.
 */

import { MalformedPacketError } from '../errors.ts';
import { scrambleModulus } from '../crypto/scramble.ts';
import type { ByteReader, ByteWriter } from '../utils/cursor.ts';
import {
  CLIENT_MESSAGE,
  type GGAuthResult,
  PROTOCOL_VERSION,
  SERVER_MESSAGE,
} from './constants.ts';

/** Reserved zero bytes following Init's modulus and GGAuth's result */
const RESERVED_SIZE = 16;

/**
 * Session initialization, first packet of every connection
 */
export interface InitMessage {
  type: 'init';
  sessionId: number;
  /** RSA modulus in plain (unscrambled) form, 128 bytes */
  modulus: Uint8Array;
  /** Traffic key every packet after this one is encrypted with, 16 bytes */
  cryptKey: Uint8Array;
}

/**
 * Reply to the client's GameGuard authentication request
 */
export interface GGAuthMessage {
  type: 'gg-auth';
  result: GGAuthResult;
}

export type ServerMessage = InitMessage | GGAuthMessage;

/**
 * Client asks to run the GameGuard handshake
 */
export interface AuthGameGuardMessage {
  type: 'auth-game-guard';
}

export type ClientMessage = AuthGameGuardMessage;

/**
 * Encode a server message at the writer's position
 */
export function encodeServerMessage(msg: ServerMessage, writer: ByteWriter): void {
  switch (msg.type) {
    case 'init': {
      const modulus = scrambleModulus(msg.modulus.slice());
      writer
        .writeC(SERVER_MESSAGE.INIT)
        .writeD(msg.sessionId)
        .writeD(PROTOCOL_VERSION)
        .writeB(modulus)
        .seek(RESERVED_SIZE)
        .writeB(msg.cryptKey);
      break;
    }
    case 'gg-auth':
      writer
        .writeC(SERVER_MESSAGE.GG_AUTH)
        .writeD(msg.result)
        .seek(RESERVED_SIZE);
      break;
    default: {
      const unknown: never = msg;
      throw new TypeError(`Unknown server message: ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Decode a client message from the reader's position
 */
export function decodeClientMessage(reader: ByteReader): ClientMessage {
  const id = reader.readC() & 0xff;
  switch (id) {
    case CLIENT_MESSAGE.AUTH_GAME_GUARD:
      return { type: 'auth-game-guard' };
    default:
      throw new MalformedPacketError(id);
  }
}

/**
 * Short description for debug output; never includes key material
 */
export function describeMessage(msg: ServerMessage | ClientMessage): string {
  switch (msg.type) {
    case 'init':
      return `INIT (session 0x${(msg.sessionId >>> 0).toString(16)})`;
    case 'gg-auth':
      return `GG_AUTH (result 0x${msg.result.toString(16)})`;
    case 'auth-game-guard':
      return 'AUTH_GAME_GUARD';
  }
}
