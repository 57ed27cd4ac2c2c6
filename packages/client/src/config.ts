/**
 * Client configuration with secure defaults.
 *
 * In production mode (NODE_ENV=production), a plain-http backend URL is
 * refused unless explicitly overridden, and verbose log levels are raised
 * to "warn".
 *
 * @module config
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface ClientConfig {
  /** Backend base URL, without a trailing slash. */
  baseUrl: string;
  /** Deadline for the server public key fetch, in ms. */
  fetchTimeoutMs: number;
  /** Where FileSecureBackend keeps its entries. */
  keystorePath: string;
  logLevel: LogLevel;
  /** Whether to prefix log lines with an ISO timestamp. */
  logTimestamps: boolean;
}

type Env = Record<string, string | undefined>;

const LOG_LEVEL_NAMES: readonly LogLevel[] = ["error", "warn", "info", "debug"];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

function envBool(env: Env, key: string, defaultVal: boolean): boolean {
  const val = env[key];
  if (val === undefined) return defaultVal;
  return val === "1" || val.toLowerCase() === "true";
}

function envInt(env: Env, key: string, defaultVal: number): number {
  const val = env[key];
  if (val === undefined) return defaultVal;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? defaultVal : parsed;
}

/**
 * Load client configuration from environment variables.
 * Throws if production mode is active with an insecure backend URL.
 */
export function loadConfig(env: Env = process.env): ClientConfig {
  const isProduction = env["NODE_ENV"] === "production";
  const baseUrl = (env["BACKEND_URL"] ?? "http://localhost:4000").replace(/\/+$/, "");

  // Production guard: key material must not be fetched over plain http
  if (isProduction && !baseUrl.startsWith("https://")) {
    if (!envBool(env, "ALLOW_INSECURE_TRANSPORT", false)) {
      throw new Error(
        "SECURITY: BACKEND_URL must use https:// in production.\n" +
          "Set ALLOW_INSECURE_TRANSPORT=true to override (NOT RECOMMENDED).",
      );
    }
  }

  const defaultLevel: LogLevel = isProduction ? "warn" : "info";
  const requested = env["LOG_LEVEL"]?.toLowerCase();
  let logLevel = requested !== undefined && isLogLevel(requested) ? requested : defaultLevel;
  if (isProduction && (logLevel === "debug" || logLevel === "info")) {
    logLevel = "warn";
  }

  return {
    baseUrl,
    fetchTimeoutMs: envInt(env, "SERVER_KEY_TIMEOUT_MS", 10_000),
    keystorePath: env["KEYSTORE_PATH"] ?? ".otto/keystore.json",
    logLevel,
    logTimestamps: envBool(env, "LOG_TIMESTAMPS", true),
  };
}
