/**
 * Environment variable loading and validation.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Read a variable, treating an empty string the same as unset.
 */
function readEnv(key: string, env: NodeJS.ProcessEnv): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Get a required environment variable.
 * Throws ConfigError if the variable is missing or empty.
 */
export function requireEnv(key: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = readEnv(key, env);
  if (value === undefined) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(
  key: string,
  defaultValue: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  return readEnv(key, env) ?? defaultValue;
}

/**
 * Get an optional environment variable as an integer.
 */
export function optionalEnvInt(
  key: string,
  defaultValue: number,
  env: NodeJS.ProcessEnv = process.env
): number {
  const value = readEnv(key, env);
  if (value === undefined) {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value)) {
    throw new ConfigError(
      `Environment variable ${key} must be a valid integer, got: ${value}`
    );
  }
  return parseInt(value, 10);
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(
  key: string,
  defaultValue: boolean,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  const value = readEnv(key, env);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}

/**
 * Get an optional environment variable restricted to a fixed set of values.
 */
export function optionalEnvEnum<T extends readonly string[]>(
  key: string,
  allowed: T,
  defaultValue: T[number],
  env: NodeJS.ProcessEnv = process.env
): T[number] {
  const value = readEnv(key, env);
  if (value === undefined) {
    return defaultValue;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(
      `Invalid ${key}: ${value}. Must be one of ${allowed.join(", ")}.`
    );
  }
  return match;
}
