/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool, maybeEnv } from "./env.js";

export { ConfigError } from "./env.js";

// Re-export run configuration module
export * from "./build/index.js";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
type AppLogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: AppLogLevel;
  /** Directory for log files */
  readonly logDir: string;
  /** Whether log entries are also appended to a file */
  readonly logToFile: boolean;
  /** Git remote overrides; unset entries fall back to the defaults */
  readonly remotes: {
    readonly pybind11?: string;
    readonly binder?: string;
    readonly llvm?: string;
  };
}

function isLogLevel(value: string): value is AppLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load and validate application configuration.
 * Fails fast on values that cannot be interpreted.
 */
export function loadAppConfig(): AppConfig {
  const env = optionalEnv("NODE_ENV", "development");
  if (!["development", "production", "test"].includes(env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${env}. Must be development, production, or test.`
    );
  }

  const logLevel = optionalEnv("LOG_LEVEL", "info");
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`
    );
  }

  return {
    env,
    logLevel,
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    remotes: {
      pybind11: maybeEnv("BINDFORGE_PYBIND11_GIT_URL"),
      binder: maybeEnv("BINDFORGE_BINDER_GIT_URL"),
      llvm: maybeEnv("BINDFORGE_LLVM_GIT_URL"),
    },
  };
}
