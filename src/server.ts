/**
 * Auth Server Implementation
 *
 * Accepts login client connections and runs the pre-login handshake on each.
 *
 * @module
 */

import { EventEmitter } from 'node:events';
import type { Transport, TransportFactory, TransportListener } from './adapters/types.ts';
import { NodeTransportFactory } from './adapters/node.ts';
import { AuthClient } from './client.ts';
import { BlowfishCrypt, type Crypt } from './crypto/ciphers.ts';
import type { RandomSource } from './crypto/random.ts';
import type { KeypairGenerator } from './keygen.ts';
import { INIT_KEY } from './protocol/constants.ts';
import { AuthPacketReader } from './protocol/reader.ts';
import { AuthPacketSender } from './protocol/sender.ts';
import { Mutex } from './utils/async.ts';

/**
 * Server configuration
 */
export interface AuthServerConfig {
  /** Debug function */
  debug?: (msg: string) => void;
  /** Source of traffic keys and scramble seeds */
  random?: RandomSource;
  /** Source of per-session credential keys */
  keygen?: KeypairGenerator;
  /** Platform listener factory, defaults to `node:net` */
  transportFactory?: TransportFactory;
  /** Maximum number of concurrent connections */
  maxConnections?: number;
}

/**
 * Connection events
 */
export type AuthConnectionEvents = {
  ready: [];
  error: [Error];
  close: [];
};

/**
 * One accepted login client
 */
export class AuthConnection extends EventEmitter<AuthConnectionEvents> {
  readonly transport: Transport;
  readonly client: AuthClient;
  private _reader: AuthPacketReader;
  private _debug?: (msg: string) => void;
  private _closed = false;

  private constructor(
    transport: Transport,
    client: AuthClient,
    reader: AuthPacketReader,
    debug?: (msg: string) => void,
  ) {
    super();
    this.transport = transport;
    this.client = client;
    this._reader = reader;
    this._debug = debug;
  }

  /**
   * Build the per-connection crypt, sender, session and reader
   */
  static async create(
    transport: Transport,
    config: Omit<AuthServerConfig, 'transportFactory' | 'maxConnections'> = {},
  ): Promise<AuthConnection> {
    const { debug, random, keygen } = config;
    const crypt = new Mutex<Crypt>(new BlowfishCrypt(INIT_KEY), 'crypt');
    const sender = new AuthPacketSender({ transport, crypt, random, debug });
    const client = await AuthClient.create({ sender, random, keygen, debug });
    const reader = new AuthPacketReader({
      crypt,
      debug,
      onMessage: (msg) => client.handle(msg),
    });
    return new AuthConnection(transport, client, reader, debug);
  }

  /**
   * Send Init, then process inbound packets until the peer goes away.
   * Resolves once the connection is closed; failures are reported through
   * the `error` event.
   */
  async run(): Promise<void> {
    try {
      await this.client.init();
      this.emit('ready');
      for await (const chunk of this.transport.readable) {
        await this._reader.push(chunk);
      }
      this._debug?.('Inbound: Peer closed connection');
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this._debug?.(`Connection error: ${error.message}`);
      if (this.listenerCount('error') > 0) {
        this.emit('error', error);
      }
    } finally {
      this.close();
    }
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.transport.close();
    this.emit('close');
  }

  get closed(): boolean {
    return this._closed;
  }
}

/**
 * Server events
 */
export type AuthServerEvents = {
  connection: [connection: AuthConnection];
  error: [Error];
  listening: [];
  close: [];
};

/**
 * Login server
 */
export class AuthServer extends EventEmitter<AuthServerEvents> {
  private _listener?: TransportListener;
  private _config: AuthServerConfig;
  private _connections = 0;

  maxConnections: number;

  constructor(config: AuthServerConfig = {}, listener?: (connection: AuthConnection) => void) {
    super();
    this._config = config;
    this.maxConnections = config.maxConnections ?? Infinity;

    if (listener) {
      this.on('connection', listener);
    }
  }

  /** Number of open connections */
  get connections(): number {
    return this._connections;
  }

  /**
   * Start listening for connections
   */
  async listen(port: number, host?: string): Promise<void> {
    const factory = this._config.transportFactory ?? new NodeTransportFactory();
    this._listener = await factory.listen({ port, host });
    this.emit('listening');

    // Accept connections
    this._acceptConnections().catch((err: unknown) => {
      this._reportError(err);
    });
  }

  /**
   * Accept incoming connections
   */
  private async _acceptConnections(): Promise<void> {
    if (!this._listener) return;

    for await (const transport of this._listener) {
      this.injectTransport(transport).catch((err: unknown) => {
        this._reportError(err);
      });
    }
  }

  /**
   * Get server address
   */
  address(): { address: string; port: number } | undefined {
    return this._listener ? { address: this._listener.address, port: this._listener.port } : undefined;
  }

  /**
   * Close the server
   */
  close(): this {
    this._listener?.close();
    this.emit('close');
    return this;
  }

  /**
   * Inject a socket/transport.
   *
   * Resolves with the connection once it has been set up; the handshake
   * keeps running in the background.
   */
  async injectTransport(transport: Transport): Promise<AuthConnection | undefined> {
    if (this._connections >= this.maxConnections) {
      transport.close();
      return undefined;
    }

    this._connections++;

    let debug = this._config.debug;
    if (debug) {
      const debugPrefix = `[${Date.now()}] `;
      const origDebug = debug;
      debug = (msg: string) => origDebug(`${debugPrefix}${msg}`);
    }

    let connection: AuthConnection;
    try {
      connection = await AuthConnection.create(transport, {
        debug,
        random: this._config.random,
        keygen: this._config.keygen,
      });
    } catch (err) {
      this._connections--;
      transport.close();
      throw err;
    }

    connection.on('close', () => {
      this._connections--;
    });
    connection.on('error', (err) => {
      this._reportError(err);
    });

    this.emit('connection', connection);
    connection.run().catch((err: unknown) => {
      this._reportError(err);
    });
    return connection;
  }

  private _reportError(err: unknown): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', err instanceof Error ? err : new Error(String(err)));
    }
  }
}
