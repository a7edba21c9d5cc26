// Session-level errors: establishing the connection and moving bytes over it.

import type { Endpoint } from "./transport.ts";

export type ConnectionErrorKind = "refused" | "timeout" | "io";

/** The TCP session could not be established. Never retried internally. */
export class ConnectionError extends Error {
  constructor(
    public readonly kind: ConnectionErrorKind,
    public readonly endpoint: Endpoint,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConnectionError";
  }

  static refused(endpoint: Endpoint, cause?: unknown): ConnectionError {
    return new ConnectionError(
      "refused",
      endpoint,
      `connection refused by ${endpoint.host}:${endpoint.port}`,
      { cause },
    );
  }

  static timeout(endpoint: Endpoint, timeoutMs: number): ConnectionError {
    return new ConnectionError(
      "timeout",
      endpoint,
      `timed out after ${timeoutMs}ms connecting to ${endpoint.host}:${endpoint.port}`,
    );
  }

  static io(endpoint: Endpoint, message: string, cause?: unknown): ConnectionError {
    return new ConnectionError(
      "io",
      endpoint,
      `cannot connect to ${endpoint.host}:${endpoint.port}: ${message}`,
      { cause },
    );
  }
}

export type TransportErrorKind = "io" | "closed";

/**
 * Socket I/O failed mid-session, or the session was already closed.
 * The connection should be considered dead.
 */
export class TransportError extends Error {
  constructor(
    public readonly kind: TransportErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransportError";
  }

  static io(message: string, cause?: unknown): TransportError {
    return new TransportError("io", message, { cause });
  }

  static closed(message = "connection closed"): TransportError {
    return new TransportError("closed", message);
  }
}

/** Client options failed validation. */
export class ConfigError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`invalid client configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}
