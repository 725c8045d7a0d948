/**
 * Legacy MMO login-server handshake wire layer
 *
 * Packet pipeline for the pre-login stage: session Init with legacy
 * scrambles, Blowfish traffic crypt with key rotation, framing, and the
 * GameGuard request/response.
 *
 * @module
 */

// ─── Server / session ────────────────────────────────────────────────────────
export * from './src/server.ts';
export * from './src/client.ts';

// ─── Errors ──────────────────────────────────────────────────────────────────
export { AuthError, isAuthError, MalformedPacketError } from './src/errors.ts';
export type { AuthErrorKind } from './src/errors.ts';

// ─── Key generation ──────────────────────────────────────────────────────────
export * from './src/keygen.ts';

// ─── Packet pipeline ─────────────────────────────────────────────────────────
export { AuthPacketSender } from './src/protocol/sender.ts';
export type { AuthPacketSenderConfig, PacketSender } from './src/protocol/sender.ts';
export { AuthPacketReader } from './src/protocol/reader.ts';
export type { AuthPacketReaderConfig } from './src/protocol/reader.ts';
export { decodeClientMessage, encodeServerMessage } from './src/protocol/messages.ts';
export type {
  AuthGameGuardMessage,
  ClientMessage,
  GGAuthMessage,
  InitMessage,
  ServerMessage,
} from './src/protocol/messages.ts';

// ─── Protocol constants (user-facing) ────────────────────────────────────────
export {
  BUFFER_SIZE,
  CLIENT_MESSAGE,
  GG_AUTH_RESULT,
  HEADER_SIZE,
  INIT_KEY,
  SERVER_MESSAGE,
} from './src/protocol/constants.ts';
export type { GGAuthResult } from './src/protocol/constants.ts';

// ─── Binary codec ────────────────────────────────────────────────────────────
export { ByteReader, ByteWriter } from './src/utils/cursor.ts';
export { Mutex } from './src/utils/async.ts';

// ─── Namespaced internals (for advanced / low-level use) ─────────────────────
export * as crypto from './src/crypto/mod.ts';
export * as adapters from './src/adapters/mod.ts';
export * as protocol from './src/protocol/mod.ts';
