// Nailgun message kinds and their single-byte wire tags.

import { UnknownMessageTypeError } from "./errors.ts";

/** Every message kind, in declaration order. */
export const MESSAGE_KINDS = [
  "argument",
  "command",
  "current_dir",
  "environment",
  "eof",
  "exit",
  "heartbeat",
  "longarg",
  "sendinput",
  "stderr",
  "stdin",
  "stdout",
] as const;

export type MessageKind = (typeof MESSAGE_KINDS)[number];

/** Tag character for each kind, as it appears on the wire. */
export const MESSAGE_TAGS = {
  argument: "A",
  command: "C",
  current_dir: "D",
  environment: "E",
  eof: ".",
  exit: "X",
  heartbeat: "H",
  longarg: "L",
  sendinput: "S",
  stderr: "2",
  stdin: "0",
  stdout: "1",
} as const satisfies Record<MessageKind, string>;

/** Kinds a client accepts while waiting for a command to finish. */
export const SERVER_MESSAGE_KINDS: ReadonlySet<MessageKind> = new Set<MessageKind>([
  "stdout",
  "stderr",
  "exit",
  "sendinput",
]);

const KIND_BY_TAG: ReadonlyMap<number, MessageKind> = new Map(
  MESSAGE_KINDS.map((kind) => [MESSAGE_TAGS[kind].charCodeAt(0), kind] as const),
);

/** Get the tag byte for a kind. */
export function tagFor(kind: MessageKind): number {
  return MESSAGE_TAGS[kind].charCodeAt(0);
}

/**
 * Get the kind for a tag byte.
 *
 * @throws UnknownMessageTypeError if the byte is not one of the known tags
 */
export function kindFor(tag: number): MessageKind {
  const kind = KIND_BY_TAG.get(tag);
  if (kind === undefined) {
    throw new UnknownMessageTypeError(tag, null, `Unknown message type: ${describeTag(tag)}`);
  }
  return kind;
}

/** Whether the server may send this kind to a client. */
export function isServerMessage(kind: MessageKind): boolean {
  return SERVER_MESSAGE_KINDS.has(kind);
}

/** Render a tag byte for error messages: `'X'` when printable, `0x07` otherwise. */
export function describeTag(tag: number): string {
  if (tag >= 0x20 && tag < 0x7f) {
    return `'${String.fromCharCode(tag)}'`;
  }
  return `0x${tag.toString(16).padStart(2, "0")}`;
}
