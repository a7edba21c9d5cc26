// Connection state machine for one Nailgun session.
//
// Owns the transport and the heartbeat loop. Every socket access (the
// executor's writes, its chunk reads, and heartbeats) goes through one Mutex,
// so chunks never interleave on the wire.

import {
  type Chunk,
  type MessageKind,
  CHUNK_HEADER_LEN,
  ProtocolDecodeError,
  UnknownMessageTypeError,
  decodeHeader,
  encodeChunk,
  isServerMessage,
  tagFor,
} from "@nailcall/wire";
import { DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_HEARTBEAT_INTERVAL_MS } from "./config.ts";
import { ConnectionError, TransportError } from "./errors.ts";
import { Heartbeat, type HeartbeatTarget } from "./heartbeat.ts";
import { LOG_NAMESPACES, type Logger, namespaceLogger } from "./logging.ts";
import { Mutex } from "./mutex.ts";
import type { ChunkTransport, Connector, Endpoint } from "./transport.ts";

export type ConnectionState = "disconnected" | "connected";

/** What the request executor needs from a connection. */
export interface ChunkChannel {
  connect(): Promise<void>;
  writeLocked(kind: MessageKind, payload?: Uint8Array | string): Promise<void>;
  readLocked(): Promise<Chunk>;
}

export interface ConnectionManagerOptions {
  endpoint: Endpoint;
  connector: Connector;
  /** Default: 500 */
  heartbeatIntervalMs?: number;
  /** Default: 10000 */
  connectTimeoutMs?: number;
  /** Parent logger; a DEBUG-gated one is created when omitted. */
  logger?: Logger;
  /** Called on every state transition. */
  onStateChange?: (state: ConnectionState) => void;
}

const HEARTBEAT_CHUNK = encodeChunk("heartbeat");

export class ConnectionManager implements ChunkChannel, HeartbeatTarget {
  readonly endpoint: Endpoint;
  private readonly connector: Connector;
  private readonly heartbeatIntervalMs: number;
  private readonly connectTimeoutMs: number;
  private readonly logger: Logger;
  private readonly heartbeatLogger: Logger;
  private readonly onStateChange?: (state: ConnectionState) => void;

  private readonly lock = new Mutex();
  private state: ConnectionState = "disconnected";
  private transport: ChunkTransport | null = null;
  private heartbeat: Heartbeat | null = null;
  private connecting: Promise<void> | null = null;
  private closing: Promise<void> | null = null;
  /** Set once close() has started tearing the current transport down. */
  private closeRequested = false;

  constructor(options: ConnectionManagerOptions) {
    this.endpoint = options.endpoint;
    this.connector = options.connector;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.logger = namespaceLogger(LOG_NAMESPACES.connection, options.logger);
    this.heartbeatLogger = namespaceLogger(LOG_NAMESPACES.heartbeat, options.logger);
    this.onStateChange = options.onStateChange;
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === "connected";
  }

  /**
   * Open the session and start heartbeats.
   *
   * No-op when already connected. Concurrent callers share one attempt, so
   * at most one socket and one heartbeat loop ever exist.
   *
   * @throws ConnectionError if the server cannot be reached
   */
  async connect(): Promise<void> {
    if (this.closing) {
      await this.closing;
    }
    if (this.transport) return;

    if (!this.connecting) {
      this.connecting = this.doConnect().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async doConnect(): Promise<void> {
    const { host, port } = this.endpoint;
    this.logger.debug({ host, port }, "connecting");

    let transport: ChunkTransport;
    try {
      transport = await this.connector(this.endpoint, { timeoutMs: this.connectTimeoutMs });
    } catch (error) {
      this.logger.debug({ host, port, err: error }, "connect failed");
      if (error instanceof ConnectionError) throw error;
      throw ConnectionError.io(this.endpoint, error instanceof Error ? error.message : String(error), error);
    }

    this.transport = transport;
    this.closeRequested = false;
    const heartbeat = new Heartbeat(this, this.heartbeatIntervalMs, this.heartbeatLogger);
    this.heartbeat = heartbeat;
    this.setState("connected");
    heartbeat.start();
    this.logger.debug({ host, port }, "connected");
  }

  /**
   * Tear the session down and wait for the heartbeat loop to exit.
   *
   * No-op when disconnected; a call made while another close is in flight
   * waits for that one. `connect()` may be called again afterwards.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.doClose().finally(() => {
        this.closing = null;
      });
    }
    return this.closing;
  }

  private async doClose(): Promise<void> {
    if (this.connecting) {
      await Promise.allSettled([this.connecting]);
    }

    const transport = this.transport;
    if (!transport) return;

    // Destroy the socket before taking the lock: a read waiting on it holds
    // the lock and only gives it up once the transport rejects.
    this.closeRequested = true;
    transport.close();

    const heartbeat = await this.lock.runExclusive(() => {
      this.transport = null;
      const current = this.heartbeat;
      this.heartbeat = null;
      current?.requestStop();
      return current;
    });

    // Joined outside the lock: the loop may be queued on it.
    await heartbeat?.join();

    this.setState("disconnected");
    this.logger.debug({ host: this.endpoint.host, port: this.endpoint.port }, "closed");
  }

  /**
   * Write one chunk under the socket lock.
   *
   * @throws TransportError if disconnected or the write fails
   */
  async writeLocked(kind: MessageKind, payload: Uint8Array | string = new Uint8Array(0)): Promise<void> {
    const bytes = encodeChunk(kind, payload);
    await this.lock.runExclusive(() => this.requireTransport().send(bytes));
    this.logger.debug({ kind, length: bytes.length - CHUNK_HEADER_LEN }, "sent chunk");
  }

  /**
   * Read one server chunk.
   *
   * Waits for a full header outside the lock so heartbeats keep flowing while
   * the server is busy, then reads header and payload under the lock. Chunks
   * buffered before the server closed the stream are still returned.
   *
   * @throws ProtocolDecodeError if the server ends the stream mid-chunk
   * @throws UnknownMessageTypeError if the tag is unknown or not a server kind
   * @throws TransportError if the connection drops or is closed
   */
  async readLocked(): Promise<Chunk> {
    const transport = this.ownedTransport();
    await transport.waitReadable(CHUNK_HEADER_LEN).catch((error: unknown) => {
      throw this.truncated(error, transport, false, (got) =>
        `truncated chunk header: expected ${CHUNK_HEADER_LEN} bytes, got ${got}`,
      );
    });

    const chunk = await this.lock.runExclusive(async (): Promise<Chunk> => {
      if (this.transport !== transport) {
        throw TransportError.closed("not connected");
      }
      const header = decodeHeader(await transport.readExact(CHUNK_HEADER_LEN));
      if (!isServerMessage(header.kind)) {
        throw new UnknownMessageTypeError(
          tagFor(header.kind),
          header.kind,
          `Unexpected message type from server: ${header.kind}`,
        );
      }
      if (header.length === 0) {
        return { header, payload: new Uint8Array(0) };
      }
      const payload = await transport.readExact(header.length).catch((error: unknown) => {
        throw this.truncated(error, transport, true, (got) =>
          `truncated ${header.kind} payload: expected ${header.length} bytes, got ${got}`,
        );
      });
      return { header, payload };
    });

    this.logger.debug({ kind: chunk.header.kind, length: chunk.header.length }, "received chunk");
    return chunk;
  }

  /** Heartbeat hook: write a heartbeat unless the session is gone. */
  sendHeartbeat(): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      const transport = this.transport;
      if (!transport || transport.isClosed()) return false;
      await transport.send(HEARTBEAT_CHUNK);
      return true;
    });
  }

  /**
   * Map the server ending the stream part-way through a chunk to a decode
   * error. A clean end between chunks, an I/O failure, or our own close()
   * keep their TransportError.
   */
  private truncated(
    error: unknown,
    transport: ChunkTransport,
    midChunk: boolean,
    describe: (got: number) => string,
  ): unknown {
    if (!(error instanceof TransportError) || error.kind !== "closed" || this.closeRequested) {
      return error;
    }
    const got = transport.buffered();
    if (!midChunk && got === 0) {
      return error;
    }
    return new ProtocolDecodeError(describe(got), { cause: error });
  }

  // Reads only need ownership: bytes buffered before the peer closed remain readable.
  private ownedTransport(): ChunkTransport {
    const transport = this.transport;
    if (!transport) {
      throw TransportError.closed("not connected");
    }
    return transport;
  }

  private requireTransport(): ChunkTransport {
    const transport = this.transport;
    if (!transport || transport.isClosed()) {
      throw TransportError.closed("not connected");
    }
    return transport;
  }

  private setState(state: ConnectionState): void {
    if (this.state !== state) {
      this.state = state;
      this.onStateChange?.(state);
    }
  }
}
