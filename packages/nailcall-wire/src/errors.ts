// Protocol-level errors raised while encoding or decoding chunks.

import type { MessageKind } from "./message-kind.ts";

/** A chunk could not be decoded: truncated bytes or an invalid field. */
export class ProtocolDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProtocolDecodeError";
  }
}

/**
 * A chunk carried a tag outside the known message kinds, or a known kind the
 * server is not allowed to send.
 */
export class UnknownMessageTypeError extends ProtocolDecodeError {
  /** The raw tag byte from the header. */
  readonly tag: number;
  /** The decoded kind, when the tag was known but not permitted here. */
  readonly kind: MessageKind | null;

  constructor(tag: number, kind: MessageKind | null, message: string) {
    super(message);
    this.name = "UnknownMessageTypeError";
    this.tag = tag;
    this.kind = kind;
  }
}

/** A chunk could not be encoded. */
export class ProtocolEncodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolEncodeError";
  }
}
