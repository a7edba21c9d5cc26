// @nailcall/core - Nailgun session runtime
//
// Connection state machine, heartbeat loop, and request executor. Generic
// over ChunkTransport; `@nailcall/tcp` provides the socket binding.

export { NailgunClient, type NailgunClientOptions } from "./client.ts";

export {
  ConnectionManager,
  type ConnectionManagerOptions,
  type ConnectionState,
  type ChunkChannel,
} from "./connection.ts";

export { Heartbeat, type HeartbeatState, type HeartbeatTarget } from "./heartbeat.ts";

export {
  RequestExecutor,
  type ExecuteOptions,
  type ExecutionResult,
  FILE_SEPARATOR_VAR,
  PATH_SEPARATOR_VAR,
  environmentEntries,
  parseExitCode,
} from "./executor.ts";

export { type ExecutionContext, type EnvTable, processContext } from "./context.ts";

export type { ChunkTransport, Connector, ConnectOptions, Endpoint } from "./transport.ts";

export {
  ConnectionError,
  type ConnectionErrorKind,
  TransportError,
  type TransportErrorKind,
  ConfigError,
} from "./errors.ts";

export {
  type ClientConfig,
  type ClientOptions,
  resolveClientConfig,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  ENV_HOST,
  ENV_PORT,
} from "./config.ts";

export {
  type Logger,
  type LoggerOptions,
  type LogNamespace,
  LOG_NAMESPACES,
  createLogger,
  isEnabled,
} from "./logging.ts";

export { Mutex } from "./mutex.ts";
