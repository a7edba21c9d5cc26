// Runs one command over a Nailgun session.
//
// Request: argument chunks, environment chunks, the working directory, then
// the command. Response: stdout/stderr chunks until an exit chunk.

import path from "node:path";
import { ProtocolDecodeError } from "@nailcall/wire";
import { concat } from "./bytes.ts";
import type { ChunkChannel } from "./connection.ts";
import { type EnvTable, type ExecutionContext, processContext } from "./context.ts";
import { LOG_NAMESPACES, type Logger, namespaceLogger } from "./logging.ts";

/** Environment entries the server uses to learn the client's separators. */
export const FILE_SEPARATOR_VAR = "NAILGUN_FILESEPARATOR";
export const PATH_SEPARATOR_VAR = "NAILGUN_PATHSEPARATOR";

export interface ExecuteOptions {
  /** Positional arguments for the command. */
  args?: readonly string[];
  /** Working directory to report instead of the process's. */
  cwd?: string;
  /** Environment to send instead of the process's. */
  env?: EnvTable;
}

export interface ExecutionResult {
  readonly out: string;
  readonly err: string;
  readonly exitcode: number;
}

const EXIT_CODE = /^[+-]?\d+$/;
const INT32_MIN = -0x8000_0000;
const INT32_MAX = 0x7fff_ffff;

/**
 * The `KEY=VALUE` entries sent as environment chunks: both separators first,
 * then the table in insertion order. Unset values are skipped.
 */
export function environmentEntries(context: ExecutionContext, env: EnvTable = context.env()): string[] {
  const entries = [
    `${FILE_SEPARATOR_VAR}=${context.fileSeparator}`,
    `${PATH_SEPARATOR_VAR}=${context.pathSeparator}`,
  ];
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      entries.push(`${key}=${value}`);
    }
  }
  return entries;
}

/**
 * Parse an exit chunk payload as a decimal integer.
 *
 * @throws ProtocolDecodeError if the payload is not a signed 32-bit integer
 */
export function parseExitCode(payload: Uint8Array): number {
  const text = new TextDecoder().decode(payload).trim();
  if (!EXIT_CODE.test(text)) {
    throw new ProtocolDecodeError(`invalid exit code: ${JSON.stringify(text)}`);
  }
  const code = Number.parseInt(text, 10);
  if (code < INT32_MIN || code > INT32_MAX) {
    throw new ProtocolDecodeError(`exit code out of range: ${text}`);
  }
  return code;
}

export class RequestExecutor {
  private readonly logger: Logger;

  constructor(
    private readonly channel: ChunkChannel,
    private readonly context: ExecutionContext = processContext,
    logger?: Logger,
  ) {
    this.logger = namespaceLogger(LOG_NAMESPACES.executor, logger);
  }

  /**
   * Execute `command` on the server and collect its output.
   *
   * Connects first if needed. Errors propagate unchanged and leave the
   * connection in an unknown state; callers should close it.
   */
  async execute(command: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    await this.channel.connect();

    const args = options.args ?? [];
    this.logger.debug({ command, argc: args.length }, "executing");

    for (const arg of args) {
      await this.channel.writeLocked("argument", arg);
    }

    for (const entry of environmentEntries(this.context, options.env)) {
      await this.channel.writeLocked("environment", entry);
    }

    const cwd = path.resolve(this.context.cwd(), options.cwd ?? ".");
    await this.channel.writeLocked("current_dir", cwd);

    await this.channel.writeLocked("command", command);

    return this.waitForExit(command);
  }

  private async waitForExit(command: string): Promise<ExecutionResult> {
    const out: Uint8Array[] = [];
    const err: Uint8Array[] = [];

    while (true) {
      const chunk = await this.channel.readLocked();
      switch (chunk.header.kind) {
        case "stdout":
          out.push(chunk.payload);
          break;
        case "stderr":
          err.push(chunk.payload);
          break;
        case "exit": {
          const exitcode = parseExitCode(chunk.payload);
          this.logger.debug({ command, exitcode }, "command exited");
          const decoder = new TextDecoder();
          return Object.freeze({
            out: decoder.decode(concat(out)),
            err: decoder.decode(concat(err)),
            exitcode,
          });
        }
        default:
          // No stdin forwarding: sendinput requests go unanswered.
          this.logger.debug({ kind: chunk.header.kind }, "ignoring server chunk");
      }
    }
  }
}
