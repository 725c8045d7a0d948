/**
 * Node.js Transport Implementation
 *
 * Provides Transport interface implementation on top of Node's stream and
 * net modules.
 */

import { createServer, type Server, Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { deferred, type Deferred } from '../utils/async.ts';
import type {
  ListenOptions,
  Transport,
  TransportFactory,
  TransportListener,
} from './types.ts';

/**
 * Node stream Transport
 *
 * Wraps a duplex stream (normally a `net.Socket`) to implement the
 * Transport interface.
 */
export class NodeTransport implements Transport {
  private _socket: Duplex;
  private _closed = false;
  private _error: Error | null = null;

  constructor(socket: Duplex) {
    this._socket = socket;
    socket.once('close', () => {
      this._closed = true;
    });
    // Reported by the next write, flush or read
    socket.on('error', (err: Error) => {
      if (!this._error) {
        this._error = err;
      }
      this._closed = true;
    });
  }

  get readable(): AsyncIterable<Uint8Array> {
    return this._read();
  }

  get remoteAddress(): string | undefined {
    return this._socket instanceof Socket ? this._socket.remoteAddress : undefined;
  }

  get remotePort(): number | undefined {
    return this._socket instanceof Socket ? this._socket.remotePort : undefined;
  }

  write(data: Uint8Array): Promise<void> {
    if (this._closed || this._socket.destroyed) {
      return Promise.reject(this._error ?? new Error('Transport is closed'));
    }
    return new Promise((resolve, reject) => {
      this._socket.write(data, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  flush(): Promise<void> {
    if (this._error) {
      return Promise.reject(this._error);
    }
    if (!this._socket.writableNeedDrain) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      const onDrain = () => {
        this._socket.off('close', onClose);
        resolve();
      };
      const onClose = () => {
        this._socket.off('drain', onDrain);
        reject(this._error ?? new Error('Transport closed before drain'));
      };
      this._socket.once('drain', onDrain);
      this._socket.once('close', onClose);
    });
  }

  close(): void {
    if (!this._closed) {
      this._closed = true;
      this._socket.destroy();
    }
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Get the underlying stream */
  get socket(): Duplex {
    return this._socket;
  }

  /** Error the socket failed with, if any */
  get error(): Error | null {
    return this._error;
  }

  private async *_read(): AsyncIterableIterator<Uint8Array> {
    if (this._error) {
      throw this._error;
    }
    for await (const chunk of this._socket) {
      if (!(chunk instanceof Uint8Array)) {
        throw new TypeError('Transport received a non-binary chunk');
      }
      yield chunk;
    }
    if (this._error) {
      throw this._error;
    }
  }
}

/**
 * Node TCP Listener
 *
 * Wraps a `net.Server` to implement the TransportListener interface.
 * Connections arriving while nobody is accepting are queued, already
 * wrapped so their socket errors are captured.
 */
export class NodeListener implements TransportListener {
  private _server: Server;
  private _closed = false;
  private _pending: NodeTransport[] = [];
  private _waiting: Deferred<NodeTransport | null> | null = null;

  constructor(server: Server) {
    this._server = server;
    server.on('connection', (socket: Socket) => {
      const transport = new NodeTransport(socket);
      const waiting = this._waiting;
      if (waiting) {
        this._waiting = null;
        waiting.resolve(transport);
      } else {
        this._pending.push(transport);
      }
    });
    server.once('close', () => {
      this._closed = true;
      this._wake(null);
    });
  }

  async *accept(): AsyncIterableIterator<Transport> {
    while (true) {
      const transport = this._pending.shift() ?? (await this._next());
      if (!transport) return;
      yield transport;
    }
  }

  close(): void {
    if (!this._closed) {
      this._closed = true;
      this._server.close();
      for (const transport of this._pending.splice(0)) {
        transport.close();
      }
      this._wake(null);
    }
  }

  get address(): string {
    const addr = this._server.address();
    return addr && typeof addr === 'object' ? addr.address : '';
  }

  get port(): number {
    const addr = this._server.address();
    return addr && typeof addr === 'object' ? addr.port : 0;
  }

  /** Async iterator implementation */
  [Symbol.asyncIterator](): AsyncIterableIterator<Transport> {
    return this.accept();
  }

  /** Get the underlying Node server */
  get server(): Server {
    return this._server;
  }

  private _next(): Promise<NodeTransport | null> {
    if (this._closed) {
      return Promise.resolve(null);
    }
    this._waiting = deferred<NodeTransport | null>();
    return this._waiting.promise;
  }

  private _wake(transport: NodeTransport | null): void {
    const waiting = this._waiting;
    if (waiting) {
      this._waiting = null;
      waiting.resolve(transport);
    }
  }
}

/**
 * Node Transport Factory
 *
 * Creates TCP listeners using `node:net`.
 */
export class NodeTransportFactory implements TransportFactory {
  /**
   * Create a TCP listener on a local address
   */
  async listen(options: ListenOptions): Promise<TransportListener> {
    const { host, port, backlog } = options;
    const server = createServer();

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen({ port, host: host || '0.0.0.0', backlog }, () => {
        server.off('error', reject);
        resolve();
      });
    });

    return new NodeListener(server);
  }
}

/**
 * Default transport factory instance
 */
export const nodeTransport: NodeTransportFactory = new NodeTransportFactory();

/**
 * Listen for incoming auth connections
 *
 * Convenience function for creating server listeners.
 */
export async function listen(port: number, host?: string): Promise<TransportListener> {
  return nodeTransport.listen({ port, host });
}
