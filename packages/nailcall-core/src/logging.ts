// Namespaced pino loggers for the client.
//
// Namespaces are switched on with the DEBUG environment variable, using the
// same patterns as npm's debug package:
//
//   DEBUG=nailcall:*                  every client namespace
//   DEBUG=nailcall:connection         connection only
//   DEBUG=*,-nailcall:heartbeat       everything but heartbeats
//
// Enabled namespaces log at `debug`; the rest are silent.

import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger };

export const LOG_NAMESPACES = {
  connection: "nailcall:connection",
  heartbeat: "nailcall:heartbeat",
  executor: "nailcall:executor",
} as const;

export type LogNamespace = (typeof LOG_NAMESPACES)[keyof typeof LOG_NAMESPACES];

export interface LoggerOptions {
  /** Debug patterns; defaults to `process.env.DEBUG`. */
  debug?: string;
  /** Where log lines go; defaults to stdout. */
  destination?: DestinationStream;
}

/**
 * Check whether a namespace is enabled by a debug pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 */
export function isEnabled(namespace: string, debug: string | undefined): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&")
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/** Create a logger for one namespace. */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const debug = options.debug ?? process.env.DEBUG;
  const level = isEnabled(namespace, debug) ? "debug" : "silent";
  const config = { name: namespace, level };
  return options.destination ? pino(config, options.destination) : pino(config);
}

/**
 * Resolve the logger for a namespace: a child of the caller's logger when one
 * was given, otherwise a fresh DEBUG-gated logger.
 */
export function namespaceLogger(namespace: LogNamespace, parent?: Logger): Logger {
  return parent ? parent.child({ ns: namespace }) : createLogger(namespace);
}
