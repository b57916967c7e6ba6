/**
 * Environment variable loading and validation.
 *
 * Every helper reads from an explicit source (default: `process.env`, after
 * `.env` has been applied), so configuration can be built from a plain map.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

function read(source: EnvSource, key: string): string | undefined {
  const value = source[key];
  return value !== undefined && value.trim() !== "" ? value.trim() : undefined;
}

/**
 * Get a required environment variable.
 * Throws ConfigError if the variable is missing or blank.
 */
export function requireEnv(key: string, source: EnvSource = process.env): string {
  const value = read(source, key);
  if (value === undefined) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get an optional environment variable, undefined when unset or blank.
 */
export function optionalEnv(key: string, source: EnvSource = process.env): string | undefined {
  return read(source, key);
}

/**
 * Get an optional environment variable as an integer.
 */
export function optionalEnvInt(key: string, source: EnvSource = process.env): number | undefined {
  const value = read(source, key);
  if (value === undefined) {
    return undefined;
  }
  if (!/^[+-]?\d+$/.test(value)) {
    throw new ConfigError(`Environment variable ${key} must be a valid integer, got: ${value}`);
  }
  return parseInt(value, 10);
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, source: EnvSource = process.env): boolean | undefined {
  const value = read(source, key);
  if (value === undefined) {
    return undefined;
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
