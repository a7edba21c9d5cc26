// Client configuration: explicit options, then environment, then defaults.

import { z } from "zod";
import { ConfigError } from "./errors.ts";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 2113;
export const DEFAULT_HEARTBEAT_INTERVAL_MS = 500;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

/** Environment variables read by `resolveClientConfig`. */
export const ENV_HOST = "NAILGUN_SERVER";
export const ENV_PORT = "NAILGUN_PORT";

const ClientConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  heartbeatIntervalMs: z.number().int().positive(),
  connectTimeoutMs: z.number().int().positive(),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export type ClientOptions = Partial<ClientConfig>;

type Env = Readonly<Record<string, string | undefined>>;

function envValue(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Resolve the full client configuration.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveClientConfig(options: ClientOptions = {}, env: Env = process.env): ClientConfig {
  const envPort = envValue(env, ENV_PORT);

  const result = ClientConfigSchema.safeParse({
    host: options.host ?? envValue(env, ENV_HOST) ?? DEFAULT_HOST,
    port: options.port ?? (envPort === undefined ? DEFAULT_PORT : Number(envPort)),
    heartbeatIntervalMs: options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS,
    connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return result.data;
}
