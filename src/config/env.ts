/**
 * Environment variable loading and validation.
 * Values in a local .env file are loaded before anything reads them.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string, public readonly key?: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function readEnv(key: string): string | undefined {
  const value = process.env[key];
  return value !== undefined && value.trim() !== "" ? value.trim() : undefined;
}

/**
 * Get a required environment variable.
 * @throws ConfigError if the variable is missing or blank
 */
export function requireEnv(key: string): string {
  const value = readEnv(key);
  if (value === undefined) {
    throw new ConfigError(`Missing required environment variable: ${key}`, key);
  }
  return value;
}

export function optionalEnv(key: string, defaultValue: string): string {
  return readEnv(key) ?? defaultValue;
}

/**
 * Get an optional environment variable as an integer.
 * Accepts an optional sign and digits only ("12px" is rejected).
 */
export function optionalEnvInt(key: string, defaultValue: number): number;
export function optionalEnvInt(key: string, defaultValue: undefined): number | undefined;
export function optionalEnvInt(key: string, defaultValue: number | undefined): number | undefined {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  if (!/^[+-]?\d+$/.test(value)) {
    throw new ConfigError(`Environment variable ${key} must be a valid integer, got: ${value}`, key);
  }
  return parseInt(value, 10);
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, defaultValue: boolean): boolean {
  const value = readEnv(key);
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
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`,
    key
  );
}
