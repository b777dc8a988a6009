// Server configuration.

import { DEFAULT_MAX_BULK_LENGTH } from "@cairn/wire";
import { z } from "zod";

export interface ServerConfig {
  /** Interface to bind. */
  host: string;
  /** TCP port; 0 picks a free one. */
  port: number;
  /** Connections served at once; more wait in a queue. */
  maxClients: number;
  /** Largest bulk string a request may declare, in bytes. */
  maxBulkLength: number;
}

export function defaultServerConfig(): ServerConfig {
  return {
    host: "127.0.0.1",
    port: 31337,
    maxClients: 64,
    maxBulkLength: DEFAULT_MAX_BULK_LENGTH,
  };
}

/** Raised when the environment holds invalid settings. */
export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

const defaults = defaultServerConfig();

// An empty string would otherwise coerce to 0.
function numeric(schema: z.ZodNumber, fallback: number) {
  return z.string().trim().min(1, "must not be empty").pipe(schema).default(String(fallback));
}

const envSchema = z.object({
  CAIRN_HOST: z.string().trim().min(1).default(defaults.host),
  CAIRN_PORT: numeric(z.coerce.number().int().min(0).max(65535), defaults.port),
  CAIRN_MAX_CLIENTS: numeric(z.coerce.number().int().positive(), defaults.maxClients),
  CAIRN_MAX_BULK_LENGTH: numeric(z.coerce.number().int().nonnegative(), defaults.maxBulkLength),
});

/**
 * Read the server configuration from environment variables.
 *
 * Unset variables take their defaults. Every invalid variable is reported in
 * one ConfigError.
 */
export function loadServerConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return {
    host: parsed.data.CAIRN_HOST,
    port: parsed.data.CAIRN_PORT,
    maxClients: parsed.data.CAIRN_MAX_CLIENTS,
    maxBulkLength: parsed.data.CAIRN_MAX_BULK_LENGTH,
  };
}
