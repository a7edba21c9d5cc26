// Buffered exact reads over a TCP stream.

import type { Duplex } from "node:stream";
import { type ChunkTransport, TransportError } from "@nailcall/core";

interface PendingRead {
  count: number;
  resolve: () => void;
  reject: (error: TransportError) => void;
}

/**
 * A ChunkTransport over a connected socket.
 *
 * Incoming bytes are buffered as they arrive; reads resolve once enough of
 * them are present. Writes go out as one `write()` per call, so a chunk is
 * never split by another writer.
 */
export class SocketChunkTransport implements ChunkTransport {
  private readonly socket: Duplex;
  private buf: Buffer = Buffer.alloc(0);
  private pending: PendingRead | null = null;
  private closed = false;
  /** Why no more bytes will arrive; set on error, peer close, or close(). */
  private readError: TransportError | null = null;

  constructor(socket: Duplex) {
    this.socket = socket;

    socket.on("data", (data: Buffer) => {
      this.buf = this.buf.length === 0 ? data : Buffer.concat([this.buf, data]);
      this.settle();
    });

    socket.on("error", (err: Error) => {
      this.closed = true;
      this.endReads(TransportError.io(err.message, err));
    });

    socket.on("end", () => {
      this.endReads(TransportError.closed("connection closed by server"));
    });

    socket.on("close", () => {
      this.closed = true;
      this.endReads(TransportError.closed());
    });
  }

  /** Bytes received but not yet read. */
  buffered(): number {
    return this.buf.length;
  }

  send(bytes: Uint8Array): Promise<void> {
    if (this.closed) {
      return Promise.reject(TransportError.closed());
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.write(bytes, (err) => {
        if (err) reject(TransportError.io(err.message, err));
        else resolve();
      });
    });
  }

  waitReadable(count: number): Promise<void> {
    if (this.buf.length >= count) {
      return Promise.resolve();
    }
    if (this.readError) {
      return Promise.reject(this.readError);
    }
    if (this.pending) {
      return Promise.reject(TransportError.io("another read is already pending"));
    }
    return new Promise<void>((resolve, reject) => {
      this.pending = { count, resolve, reject };
    });
  }

  async readExact(count: number): Promise<Uint8Array> {
    await this.waitReadable(count);
    const out = new Uint8Array(this.buf.subarray(0, count));
    this.buf = this.buf.subarray(count);
    return out;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.endReads(TransportError.closed());
    this.socket.destroy();
  }

  isClosed(): boolean {
    return this.closed;
  }

  private settle(): void {
    const pending = this.pending;
    if (pending && this.buf.length >= pending.count) {
      this.pending = null;
      pending.resolve();
    }
  }

  private endReads(error: TransportError): void {
    if (!this.readError) {
      this.readError = error;
    }
    const pending = this.pending;
    this.pending = null;
    pending?.reject(this.readError);
  }
}
