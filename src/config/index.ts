/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvEnum,
} from "./env.js";

export {
  ConfigError,
  requireEnv,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  optionalEnvEnum,
} from "./env.js";

export const APP_ENVIRONMENTS = ["development", "production", "test"] as const;
export type AppEnvironment = (typeof APP_ENVIRONMENTS)[number];

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type ConfiguredLogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: AppEnvironment;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: ConfiguredLogLevel;
  /** Directory for log files */
  readonly logDir: string;
  /** Whether the log file is written at all */
  readonly logToFile: boolean;
  /** Application name */
  readonly appName: string;
  /** Directory holding the CRT-*.csv / CRT-*.yaml catalogue files */
  readonly catalogueDir: string;
  /** Explicit run ID; generated at startup when absent */
  readonly runId: string | undefined;
}

/**
 * Load and validate application configuration from an environment map.
 * Fails fast on values that cannot be interpreted.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const debug = optionalEnvBool("DEBUG", false, env);
  const runId = optionalEnv("CRT_RUN_ID", "", env);

  return Object.freeze({
    env: optionalEnvEnum("NODE_ENV", APP_ENVIRONMENTS, "development", env),
    debug,
    logLevel: optionalEnvEnum("LOG_LEVEL", LOG_LEVELS, debug ? "debug" : "info", env),
    logDir: optionalEnv("LOG_DIR", "output/logs", env),
    logToFile: optionalEnvBool("LOG_TO_FILE", true, env),
    appName: optionalEnv("APP_NAME", "crt-catalogue-hub", env),
    catalogueDir: optionalEnv("CRT_CATALOGUE_DIR", "data/catalogues", env),
    runId: runId === "" ? undefined : runId,
  });
}

/**
 * Validate configuration values that parse but do not make sense together.
 * Call this at application startup to fail fast.
 */
export function validateConfig(config: AppConfig): void {
  if (config.runId !== undefined && !/^[A-Za-z0-9._-]+$/.test(config.runId)) {
    throw new ConfigError(
      `Invalid CRT_RUN_ID: ${config.runId}. Use letters, digits, ".", "_" or "-".`
    );
  }

  if (config.env === "production" && config.logLevel === "debug") {
    throw new ConfigError("LOG_LEVEL=debug is not allowed when NODE_ENV=production.");
  }
}
