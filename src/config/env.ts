/**
 * Environment variable readers.
 *
 * Every reader takes the variable source explicitly (defaulting to
 * `process.env`) so configuration can be built from a fixed map in tests.
 */

import "dotenv/config";

import { ProvisionerError } from "../errors.js";

export type EnvSource = Readonly<Record<string, string | undefined>>;

export class ConfigError extends ProvisionerError {
  readonly code = "CONFIG_INVALID";

  constructor(
    message: string,
    public readonly variable?: string
  ) {
    super(message);
  }
}

function lookup(source: EnvSource, key: string): string | undefined {
  const value = source[key];
  return value === undefined || value === "" ? undefined : value;
}

export function optionalEnv(
  key: string,
  defaultValue: string,
  source: EnvSource = process.env
): string {
  return lookup(source, key) ?? defaultValue;
}

/**
 * Get an optional environment variable as an integer.
 */
export function optionalEnvInt(
  key: string,
  defaultValue: number,
  source: EnvSource = process.env
): number {
  const value = lookup(source, key);
  if (value === undefined) {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(
      `Environment variable ${key} must be a valid integer, got: ${value}`,
      key
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
  source: EnvSource = process.env
): boolean {
  const value = lookup(source, key);
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
