// @nailcall/tcp - Nailgun client over TCP (Node.js only)
//
// Provides the socket transport and `createClient`, and re-exports the
// session runtime and wire codec for convenience.

import {
  type ClientOptions,
  type ConnectionState,
  type ExecutionContext,
  type Logger,
  NailgunClient,
  resolveClientConfig,
} from "@nailcall/core";
import { connectTcp } from "./transport.ts";

export { SocketChunkTransport } from "./framing.ts";
export { connectTcp } from "./transport.ts";

export interface CreateClientOptions extends ClientOptions {
  context?: ExecutionContext;
  logger?: Logger;
  onStateChange?: (state: ConnectionState) => void;
}

/**
 * Create a Nailgun client. It connects on the first `execute()` (or an
 * explicit `connect()`).
 *
 * Host and port default to `NAILGUN_SERVER` / `NAILGUN_PORT`, then
 * `localhost:2113`.
 *
 * @throws ConfigError if an option is invalid
 */
export function createClient(options: CreateClientOptions = {}): NailgunClient {
  const { context, logger, onStateChange, ...clientOptions } = options;
  return new NailgunClient({
    config: resolveClientConfig(clientOptions),
    connector: connectTcp,
    context,
    logger,
    onStateChange,
  });
}

export {
  NailgunClient,
  type NailgunClientOptions,
  ConnectionManager,
  type ConnectionState,
  RequestExecutor,
  type ExecuteOptions,
  type ExecutionResult,
  type ExecutionContext,
  type ClientConfig,
  type ClientOptions,
  resolveClientConfig,
  ConnectionError,
  TransportError,
  ConfigError,
  createLogger,
  type Logger,
} from "@nailcall/core";

export {
  type MessageKind,
  type Chunk,
  type ChunkHeader,
  ProtocolDecodeError,
  UnknownMessageTypeError,
} from "@nailcall/wire";
