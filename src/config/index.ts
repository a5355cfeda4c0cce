/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { isLogLevel, type LogLevel } from "../logging/index.js";
import {
  ConfigError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  type EnvSource,
} from "./env.js";

export {
  ConfigError,
  requireEnv,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  type EnvSource,
} from "./env.js";

// Sample data configuration
export * from "./sample/index.js";

export const ENVIRONMENTS = ["development", "production", "test"] as const;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Append log entries to a file */
  readonly logToFile: boolean;
  /** Default number of sample records the CLI generates */
  readonly sampleSize: number;
}

/**
 * Read configuration from the environment.
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  return Object.freeze({
    env: optionalEnv("NODE_ENV", "development", env),
    logLevel: optionalEnv("LOG_LEVEL", "info", env),
    appName: optionalEnv("APP_NAME", "student-records", env),
    logDir: optionalEnv("LOG_DIR", "output/logs", env),
    logToFile: optionalEnvBool("LOG_TO_FILE", false, env),
    sampleSize: optionalEnvInt("SAMPLE_SIZE", 100, env),
  });
}

/**
 * Validate loaded configuration. Call at startup to fail fast.
 *
 * @returns The configured log level, narrowed
 * @throws ConfigError on the first invalid value
 */
export function validateConfig(config: AppConfig): LogLevel {
  if (!(ENVIRONMENTS as readonly string[]).includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  if (config.sampleSize < 1) {
    throw new ConfigError(`Invalid SAMPLE_SIZE: ${config.sampleSize}. Must be at least 1.`);
  }

  return config.logLevel;
}
