/**
 * Byte transport abstraction.
 *
 * The connection manager drives the protocol through this interface so the
 * socket binding (`@nailcall/tcp`) and in-memory test transports are
 * interchangeable.
 */

/** Where a Nailgun server listens. */
export interface Endpoint {
  readonly host: string;
  readonly port: number;
}

/**
 * A connected, ordered byte stream.
 *
 * Reads are exact: a read resolves only once the requested number of bytes
 * has arrived, and rejects with `TransportError` if the stream closes first.
 * At most one read may be pending at a time.
 */
export interface ChunkTransport {
  /** Write bytes as a single unit. */
  send(bytes: Uint8Array): Promise<void>;

  /** Resolve once at least `count` bytes are buffered, without consuming them. */
  waitReadable(count: number): Promise<void>;

  /** Consume exactly `count` bytes. */
  readExact(count: number): Promise<Uint8Array>;

  /** Bytes received but not yet consumed. */
  buffered(): number;

  /**
   * Close the stream. Pending reads reject with `TransportError`.
   * Safe to call more than once.
   */
  close(): void;

  isClosed(): boolean;
}

export interface ConnectOptions {
  /** Give up on the handshake after this many milliseconds. */
  timeoutMs: number;
}

/** Opens a transport to an endpoint, failing with `ConnectionError`. */
export type Connector = (endpoint: Endpoint, options: ConnectOptions) => Promise<ChunkTransport>;
