/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { LOG_LEVELS, type LogLevel } from "../logging/index.js";
import {
  optionalEnv,
  optionalEnvBool,
  optionalEnvChoice,
  type EnvSource,
} from "./env.js";

export { ConfigError, type EnvSource } from "./env.js";

// Site configuration (content files)
export * from "./site/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: Environment;
  /** Enable debug mode (forces log level to debug) */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: LogLevel;
  /** Application name, used as the root logger component */
  readonly appName: string;
  /** Directory holding site configuration files */
  readonly contentDir: string;
  /** Also append log entries to output/logs/ */
  readonly logToFile: boolean;
}

/**
 * Load and validate application configuration from environment variables.
 *
 * @throws ConfigError if a variable holds an unusable value
 */
export function loadAppConfig(env: EnvSource = process.env): AppConfig {
  const debug = optionalEnvBool("DEBUG", false, env);

  const config: AppConfig = {
    env: optionalEnvChoice("NODE_ENV", ENVIRONMENTS, "development", env),
    debug,
    logLevel: debug ? "debug" : optionalEnvChoice("LOG_LEVEL", LOG_LEVELS, "info", env),
    appName: optionalEnv("APP_NAME", "sitesmith", env),
    contentDir: optionalEnv("SITESMITH_CONTENT_DIR", "content", env),
    logToFile: optionalEnvBool("SITESMITH_LOG_FILE", false, env),
  };
  return Object.freeze(config);
}
