// @nailcall/wire - Nailgun wire protocol types and chunk codec
//
// Transport-agnostic: no sockets, no Node.js APIs.

export {
  MESSAGE_KINDS,
  MESSAGE_TAGS,
  SERVER_MESSAGE_KINDS,
  type MessageKind,
  tagFor,
  kindFor,
  isServerMessage,
  describeTag,
} from "./message-kind.ts";

export {
  CHUNK_HEADER_LEN,
  MAX_PAYLOAD_LEN,
  type ChunkHeader,
  type Chunk,
  encodeHeader,
  encodeChunk,
  decodeHeader,
  decodeChunk,
} from "./chunk.ts";

export { ProtocolDecodeError, ProtocolEncodeError, UnknownMessageTypeError } from "./errors.ts";
