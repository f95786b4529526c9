import { isLogLevel } from "./logging/logger";
import type { LogLevel } from "./logging/logger";

export type ServerOptions = {
  // connections beyond this are refused by the listener.
  maxConnections: number;
};

export type ListenAddress = {
  host: string;
  port: number;
};

export type Config = {
  address: ListenAddress;
  options: ServerOptions;
  logLevel: LogLevel;
};

export const DEFAULT_OPTIONS: ServerOptions = {
  maxConnections: 128,
};

export const DEFAULT_ADDRESS: ListenAddress = {
  host: "0.0.0.0",
  port: 1965,
};

export function resolveOptions(options: Partial<ServerOptions> = {}): ServerOptions {
  const resolved = { ...DEFAULT_OPTIONS, ...options };
  if (!Number.isInteger(resolved.maxConnections) || resolved.maxConnections < 1) {
    throw new RangeError(
      `maxConnections must be a positive integer, got ${resolved.maxConnections}`
    );
  }
  return resolved;
}

function parseIntVar(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new RangeError(`${name} must be a whole number, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

/**
 * Reads GEMINI_HOST, GEMINI_PORT, GEMINI_MAX_CONNECTIONS and
 * GEMINI_LOG_LEVEL, falling back to the defaults for anything unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const port = parseIntVar(env, "GEMINI_PORT") ?? DEFAULT_ADDRESS.port;
  if (port > 65535) {
    throw new RangeError(`GEMINI_PORT out of range: ${port}`);
  }

  const logLevel = env.GEMINI_LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new RangeError(`unknown GEMINI_LOG_LEVEL "${logLevel}"`);
  }

  const maxConnections = parseIntVar(env, "GEMINI_MAX_CONNECTIONS");
  return {
    address: {
      host: env.GEMINI_HOST || DEFAULT_ADDRESS.host,
      port,
    },
    options: resolveOptions(maxConnections === undefined ? {} : { maxConnections }),
    logLevel,
  };
}
