import { BoPiConfigError } from "./errors.js";
import type { BoPiClientConfig } from "./client.js";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

export interface AppConfig {
  device: Required<Pick<BoPiClientConfig, "host" | "port" | "requestTimeout">>;
  logLevel: LogLevel;
}

const DEFAULT_PORT = 80;
const DEFAULT_REQUEST_TIMEOUT = 10;
const DEFAULT_LOG_LEVEL: LogLevel = "info";

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value || value.trim() === "") {
    throw new BoPiConfigError(`${name} environment variable is required`);
  }
  return value.trim();
}

function optionalNumberEnv(env: NodeJS.ProcessEnv, name: string, def: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return def;
  const n = Number(raw);
  if (Number.isNaN(n)) {
    throw new BoPiConfigError(`Environment variable ${name} must be a number`);
  }
  return n;
}

/** Reads `LOG_LEVEL`, defaulting to "info". */
export function readLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return DEFAULT_LOG_LEVEL;
  if (!isLogLevel(raw)) {
    throw new BoPiConfigError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return raw;
}

/**
 * Reads server settings from the environment.
 *
 * Only presence and number syntax are checked here; `BoPiClient` validates
 * the ranges when it is constructed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    device: {
      host: requireEnv(env, "BOPI_HOST"),
      port: optionalNumberEnv(env, "BOPI_PORT", DEFAULT_PORT),
      requestTimeout: optionalNumberEnv(env, "BOPI_REQUEST_TIMEOUT", DEFAULT_REQUEST_TIMEOUT),
    },
    logLevel: readLogLevel(env),
  };
}
