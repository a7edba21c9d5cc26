// Chunk framing for the Nailgun wire protocol.
//
// Every chunk is a fixed 5-byte header followed by the payload:
//
//   [u32 big-endian payload length][u8 type tag][payload bytes]

import { ProtocolDecodeError, ProtocolEncodeError } from "./errors.ts";
import { type MessageKind, kindFor, tagFor } from "./message-kind.ts";

/** Header size in bytes. */
export const CHUNK_HEADER_LEN = 5;

/** Largest payload a u32 length prefix can describe. */
export const MAX_PAYLOAD_LEN = 0xffff_ffff;

export interface ChunkHeader {
  readonly kind: MessageKind;
  /** Payload length in bytes. */
  readonly length: number;
}

export interface Chunk {
  readonly header: ChunkHeader;
  readonly payload: Uint8Array;
}

const textEncoder = new TextEncoder();

// Strings are sent as UTF-8.
function payloadBytes(payload: Uint8Array | string): Uint8Array {
  return typeof payload === "string" ? textEncoder.encode(payload) : payload;
}

/** Encode a header for a payload of `length` bytes. */
export function encodeHeader(kind: MessageKind, length: number): Uint8Array {
  if (!Number.isInteger(length) || length < 0 || length > MAX_PAYLOAD_LEN) {
    throw new ProtocolEncodeError(`payload length ${length} does not fit a u32 length prefix`);
  }
  const out = new Uint8Array(CHUNK_HEADER_LEN);
  const view = new DataView(out.buffer);
  view.setUint32(0, length, false);
  out[4] = tagFor(kind);
  return out;
}

/** Encode a full chunk: header then payload, as one buffer. */
export function encodeChunk(kind: MessageKind, payload: Uint8Array | string = new Uint8Array(0)): Uint8Array {
  const bytes = payloadBytes(payload);
  const out = new Uint8Array(CHUNK_HEADER_LEN + bytes.length);
  out.set(encodeHeader(kind, bytes.length), 0);
  out.set(bytes, CHUNK_HEADER_LEN);
  return out;
}

/**
 * Decode a chunk header from the first 5 bytes of `buf`.
 *
 * @throws ProtocolDecodeError if fewer than 5 bytes are available
 * @throws UnknownMessageTypeError if the tag byte is not a known kind
 */
export function decodeHeader(buf: Uint8Array): ChunkHeader {
  if (buf.length < CHUNK_HEADER_LEN) {
    throw new ProtocolDecodeError(
      `truncated chunk header: expected ${CHUNK_HEADER_LEN} bytes, got ${buf.length}`,
    );
  }
  const view = new DataView(buf.buffer, buf.byteOffset, CHUNK_HEADER_LEN);
  const length = view.getUint32(0, false);
  const kind = kindFor(buf[4]);
  return { kind, length };
}

/**
 * Decode a complete chunk from `buf`. Bytes past the payload are ignored.
 *
 * @throws ProtocolDecodeError if the header or payload is truncated
 */
export function decodeChunk(buf: Uint8Array): Chunk {
  const header = decodeHeader(buf);
  const end = CHUNK_HEADER_LEN + header.length;
  if (buf.length < end) {
    throw new ProtocolDecodeError(
      `truncated ${header.kind} payload: expected ${header.length} bytes, got ${buf.length - CHUNK_HEADER_LEN}`,
    );
  }
  return { header, payload: buf.slice(CHUNK_HEADER_LEN, end) };
}
