/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
} from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

export { ConfigError } from "./env.js";

// Re-export suite/run configuration module
export * from "./run/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Write log lines to a file as well as the console */
  readonly logToFile: boolean;
  /** Default per-stage subprocess timeout in ms (0 = wait indefinitely) */
  readonly stageTimeoutMs: number;
  /** Application name */
  readonly appName: string;
}

/**
 * Read the environment-driven configuration.
 *
 * Nothing is read at import time, so a bad value surfaces where the caller
 * handles errors.
 *
 * @throws ConfigError if a variable holds an invalid value
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool("LOG_TO_FILE", true),
    stageTimeoutMs: optionalEnvInt("STAGE_TIMEOUT_MS", 0),
    appName: optionalEnv("APP_NAME", "spectrum-parity"),
  };
}

export interface ValidatedConfig extends AppConfig {
  readonly logLevel: LogLevel;
}

/**
 * Load and validate the environment-driven configuration.
 * Call this at startup, inside the entry point's error handling.
 *
 * @throws ConfigError on the first invalid value
 */
export function validateConfig(): ValidatedConfig {
  const config = loadConfig();

  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  const logLevel = config.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`
    );
  }

  return { ...config, logLevel };
}
