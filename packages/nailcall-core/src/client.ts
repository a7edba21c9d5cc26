// Nailgun client: one connection manager plus one request executor.

import type { ClientConfig } from "./config.ts";
import { ConnectionManager, type ConnectionState } from "./connection.ts";
import { type ExecutionContext, processContext } from "./context.ts";
import { type ExecuteOptions, type ExecutionResult, RequestExecutor } from "./executor.ts";
import type { Logger } from "./logging.ts";
import type { Connector } from "./transport.ts";

export interface NailgunClientOptions {
  config: ClientConfig;
  connector: Connector;
  /** Source of cwd and environment; defaults to the current process. */
  context?: ExecutionContext;
  logger?: Logger;
  onStateChange?: (state: ConnectionState) => void;
}

/**
 * A client for one Nailgun session at a time.
 *
 * Not safe for concurrent `execute()` calls; use one client per concurrent
 * command.
 *
 * Usually built by `createClient()` from `@nailcall/tcp`, which resolves the
 * config and supplies the TCP connector.
 *
 * @example
 * ```typescript
 * const client = new NailgunClient({ config: resolveClientConfig({ port: 2113 }), connector: connectTcp });
 * const { out, exitcode } = await client.execute("com.example.HelloWorld", { args: ["hi"] });
 * await client.close();
 * ```
 */
export class NailgunClient {
  readonly config: ClientConfig;
  private readonly connection: ConnectionManager;
  private readonly executor: RequestExecutor;

  constructor(options: NailgunClientOptions) {
    this.config = options.config;
    this.connection = new ConnectionManager({
      endpoint: { host: options.config.host, port: options.config.port },
      connector: options.connector,
      heartbeatIntervalMs: options.config.heartbeatIntervalMs,
      connectTimeoutMs: options.config.connectTimeoutMs,
      logger: options.logger,
      onStateChange: options.onStateChange,
    });
    this.executor = new RequestExecutor(
      this.connection,
      options.context ?? processContext,
      options.logger,
    );
  }

  getState(): ConnectionState {
    return this.connection.getState();
  }

  /** Connect eagerly. `execute()` connects on demand otherwise. */
  connect(): Promise<void> {
    return this.connection.connect();
  }

  execute(command: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    return this.executor.execute(command, options);
  }

  close(): Promise<void> {
    return this.connection.close();
  }
}
