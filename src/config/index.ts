/**
 * Application configuration.
 * Reads the environment once and exposes typed values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
} from "./env.js";
import { LOG_LEVELS, type LogLevel } from "../logging/index.js";
import {
  DEFAULT_ARTIFACTS_DIR,
  DEFAULT_MAX_DEPTH,
  loadEngineConfig,
  type EngineConfig,
} from "./engine/index.js";

export { ConfigError } from "./env.js";
export * from "./engine/index.js";

export const ENVIRONMENTS = ["development", "production", "test"] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

/** ARTIFACTS_DIR value that disables `{{artifacts}}`. */
export const ARTIFACTS_DISABLED = "none";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  readonly debug: boolean;
  readonly logLevel: string;
  readonly appName: string;
  /** ARTIFACTS_DIR; null when set to "none" */
  readonly artifactsDir: string | null;
  /** ENTITY_POOL_DIR: directory holding entity-pool.txt */
  readonly entityPoolDir: string;
  /** BASE_DIR: where relative function paths resolve */
  readonly baseDir: string;
  /** MAX_DEPTH */
  readonly maxDepth: number;
  /** SEED; unset for fresh randomness */
  readonly seed: number | undefined;
}

function loadConfig(): AppConfig {
  const artifactsDir = optionalEnv("ARTIFACTS_DIR", DEFAULT_ARTIFACTS_DIR);
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "sandbox-question-engine"),
    artifactsDir: artifactsDir === ARTIFACTS_DISABLED ? null : artifactsDir,
    entityPoolDir: optionalEnv("ENTITY_POOL_DIR", "config"),
    baseDir: optionalEnv("BASE_DIR", "."),
    maxDepth: optionalEnvInt("MAX_DEPTH", DEFAULT_MAX_DEPTH),
    seed: optionalEnvInt("SEED", undefined),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate the loaded configuration. Call at startup to fail fast.
 */
export function validateConfig(target: AppConfig = config): void {
  if (!ENVIRONMENTS.some((env) => env === target.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${target.env}. Must be development, production, or test.`,
      "NODE_ENV"
    );
  }

  if (!LOG_LEVELS.some((level) => level === target.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${target.logLevel}. Must be debug, info, warn, or error.`,
      "LOG_LEVEL"
    );
  }

  // Range checks on the engine fields
  engineConfigFrom(target);
}

/**
 * Engine configuration derived from the application configuration.
 * @throws EngineConfigError if the engine fields are out of range
 */
export function engineConfigFrom(target: AppConfig = config): Readonly<EngineConfig> {
  return loadEngineConfig({
    artifactsDir: target.artifactsDir,
    baseDir: target.baseDir,
    maxDepth: target.maxDepth,
    ...(target.seed !== undefined ? { seed: target.seed } : {}),
  });
}

/**
 * Configured log level, "info" when LOG_LEVEL is not a known level.
 */
export function configuredLogLevel(target: AppConfig = config): LogLevel {
  return LOG_LEVELS.find((level) => level === target.logLevel) ?? "info";
}
