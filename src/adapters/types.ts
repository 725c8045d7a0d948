/**
 * Transport Abstraction
 *
 * Defines the byte-level transport the auth protocol is spoken over.
 * Implementations can wrap TCP sockets or in-memory pipes.
 */

/**
 * Outbound half of a transport, all the packet sender needs
 */
export interface TransportSink {
  /** Queue `data` for sending; resolves once the transport accepted it */
  write(data: Uint8Array): Promise<void>;

  /** Resolve once everything written so far has been handed off */
  flush(): Promise<void>;
}

/**
 * Transport interface for auth connections
 */
export interface Transport extends TransportSink {
  /** Incoming data, in arrival order; ends when the peer closes */
  readonly readable: AsyncIterable<Uint8Array>;

  /** Remote address information (if available) */
  readonly remoteAddress?: string;

  /** Remote port (if available) */
  readonly remotePort?: number;

  /** Close the transport */
  close(): void;

  /** Whether the transport is closed */
  readonly closed: boolean;
}

/**
 * Server listener interface
 */
export interface TransportListener extends AsyncIterable<Transport> {
  /** Accept incoming connections */
  accept(): AsyncIterableIterator<Transport>;

  /** Close the listener */
  close(): void;

  /** Local address the listener is bound to */
  readonly address: string;

  /** Local port the listener is bound to */
  readonly port: number;
}

/**
 * Server listen options
 */
export interface ListenOptions {
  /** Host/address to bind to */
  host?: string;

  /** Port to listen on */
  port: number;

  /** Backlog size for pending connections */
  backlog?: number;
}

/**
 * Transport factory interface
 *
 * Implementations provide platform-specific listeners.
 */
export interface TransportFactory {
  /** Create a server listener */
  listen(options: ListenOptions): Promise<TransportListener>;
}
