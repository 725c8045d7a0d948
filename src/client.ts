/**
 * Auth Client Session
 *
 * Server-side view of one connected login client: owns the session key
 * material and walks the pre-login handshake.
 *
 * @module
 */

import { MalformedPacketError, hexByte, makeError } from './errors.ts';
import { type RandomSource, secureRandom } from './crypto/random.ts';
import { type CredentialKeyPair, type KeypairGenerator, rsaKeypairGenerator } from './keygen.ts';
import {
  CLIENT_MESSAGE,
  GG_AUTH_RESULT,
  SESSION_ID,
  TRAFFIC_KEY_SIZE,
} from './protocol/constants.ts';
import type { ClientMessage } from './protocol/messages.ts';
import type { PacketSender } from './protocol/sender.ts';
import { allocBytes } from './utils/binary.ts';
import { Mutex } from './utils/async.ts';

/**
 * Handshake phase of a session
 */
export type AuthClientPhase = 'created' | 'awaiting-game-guard' | 'game-guard-acknowledged';

/**
 * Auth client configuration
 */
export interface AuthClientConfig {
  sender: PacketSender;
  /** Source of the traffic key */
  random?: RandomSource;
  /** Source of the credential key pair */
  keygen?: KeypairGenerator;
  debug?: (msg: string) => void;
}

interface AuthClientState {
  sender: PacketSender;
  cryptKey: Uint8Array;
  credentialsKey: CredentialKeyPair;
}

/**
 * One login session
 */
export class AuthClient {
  private _state: Mutex<AuthClientState>;
  private _phase: AuthClientPhase = 'created';
  private _debug?: (msg: string) => void;

  private constructor(state: AuthClientState, debug?: (msg: string) => void) {
    this._state = new Mutex(state, 'state');
    this._debug = debug;
  }

  /**
   * Generate session keys and create the session
   */
  static async create(config: AuthClientConfig): Promise<AuthClient> {
    // Generate keys for traffic/credential encryption
    const cryptKey = (config.random ?? secureRandom).fill(allocBytes(TRAFFIC_KEY_SIZE));
    const credentialsKey = await (config.keygen ?? rsaKeypairGenerator).generate();

    return new AuthClient(
      { sender: config.sender, cryptKey, credentialsKey },
      config.debug,
    );
  }

  /** Current handshake phase, only changed while the session lock is held */
  get phase(): AuthClientPhase {
    return this._phase;
  }

  /**
   * Send the Init packet carrying the credential modulus and traffic key
   */
  init(): Promise<void> {
    return this._state.lock(async (state) => {
      if (this._phase !== 'created') {
        throw makeError(`Session already initialized (${this._phase})`, 'state');
      }
      await state.sender.send({
        type: 'init',
        sessionId: SESSION_ID,
        modulus: state.credentialsKey.modulus,
        cryptKey: state.cryptKey,
      });
      this._setPhase('awaiting-game-guard');
    });
  }

  /**
   * React to a decoded client message
   */
  handle(msg: ClientMessage): Promise<void> {
    return this._state.lock(async (state) => {
      switch (msg.type) {
        case 'auth-game-guard':
          if (this._phase !== 'awaiting-game-guard') {
            throw new MalformedPacketError(
              CLIENT_MESSAGE.AUTH_GAME_GUARD,
              `Unexpected packet id (0x${hexByte(CLIENT_MESSAGE.AUTH_GAME_GUARD)}) in phase ${this._phase}`,
            );
          }
          await state.sender.send({ type: 'gg-auth', result: GG_AUTH_RESULT.SKIP });
          this._setPhase('game-guard-acknowledged');
          break;
      }
    });
  }

  /** Copy of the session traffic key */
  cryptKey(): Promise<Uint8Array> {
    return this._state.lock((state) => state.cryptKey.slice());
  }

  /** Copy of the session credential key pair */
  credentialsKey(): Promise<CredentialKeyPair> {
    return this._state.lock(({ credentialsKey: pair }) => ({
      bits: pair.bits,
      modulus: pair.modulus.slice(),
      publicExponent: pair.publicExponent.slice(),
      privateExponent: pair.privateExponent.slice(),
    }));
  }

  private _setPhase(phase: AuthClientPhase): void {
    this._debug?.(`Session phase ${this._phase} -> ${phase}`);
    this._phase = phase;
  }
}
