/**
 * Engine configuration loader.
 *
 * Responsible for:
 * - Reading configuration from environment variables (via dotenv)
 * - Applying explicit overrides on top
 * - Validating against the schema with fail-fast behavior
 * - Freezing the result
 */

import type { ZodIssue } from "zod";

import { ProvisionerError } from "../errors.js";
import { DEFAULT_ENGINE_CONFIG } from "./defaults.js";
import {
  optionalEnv,
  optionalEnvBool,
  optionalEnvInt,
  type EnvSource,
} from "./env.js";
import {
  EngineConfigSchema,
  type EngineConfig,
  type EngineConfigInput,
} from "./schema.js";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Structured validation error for engine configuration.
 */
export class EngineConfigError extends ProvisionerError {
  readonly code = "ENGINE_CONFIG_INVALID";

  constructor(
    message: string,
    public readonly issues: ConfigValidationIssue[]
  ) {
    super(message);
  }

  format(): string {
    const lines = ["Engine configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Convert Zod issues to our structured format.
 */
export function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Read the raw configuration from environment variables, falling back to
 * DEFAULT_ENGINE_CONFIG for anything unset.
 */
export function readEngineEnv(
  source: EnvSource = process.env
): Record<keyof EngineConfigInput, unknown> {
  const d = DEFAULT_ENGINE_CONFIG;
  return {
    env: optionalEnv("NODE_ENV", d.env, source),
    logLevel: optionalEnv("LOG_LEVEL", d.logLevel, source),
    appName: optionalEnv("APP_NAME", d.appName, source),
    installRoot: optionalEnv("INSTALL_ROOT", d.installRoot, source),
    provisionerUrl: optionalEnv("PROVISIONER_URL", d.provisionerUrl, source),
    commandUrl: optionalEnv("COMMAND_URL", d.commandUrl, source),
    tenantId: optionalEnvInt("TENANT_ID", d.tenantId, source),
    extractCommand: optionalEnv("EXTRACT_COMMAND", d.extractCommand, source),
    logDir: optionalEnv("LOG_DIR", d.logDir, source),
    logToFile: optionalEnvBool("LOG_TO_FILE", d.logToFile, source),
  };
}

/**
 * Validate a raw configuration object.
 *
 * @throws EngineConfigError if validation fails
 */
export function parseEngineConfig(input: unknown): Readonly<EngineConfig> {
  const result = EngineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new EngineConfigError(
      `Invalid engine configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Load the engine configuration from the environment plus explicit overrides.
 *
 * @throws ConfigError       if an environment variable has the wrong shape
 * @throws EngineConfigError if the merged configuration fails validation
 */
export function loadEngineConfig(
  overrides: Partial<EngineConfigInput> = {},
  source: EnvSource = process.env
): Readonly<EngineConfig> {
  return parseEngineConfig({ ...readEngineEnv(source), ...overrides });
}
