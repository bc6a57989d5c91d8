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

/** Variables to read from. Defaults to process.env. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

function read(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  return value !== undefined && value !== "" ? value : undefined;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(
  key: string,
  defaultValue: string,
  env: EnvSource = process.env
): string {
  return read(env, key) ?? defaultValue;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(
  key: string,
  defaultValue: boolean,
  env: EnvSource = process.env
): boolean {
  const value = read(env, key);
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
export function optionalEnvChoice<T extends string>(
  key: string,
  choices: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env
): T {
  const value = read(env, key);
  if (value === undefined) {
    return defaultValue;
  }
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(
      `Invalid ${key}: ${value}. Must be one of ${choices.join(", ")}.`
    );
  }
  return match;
}
