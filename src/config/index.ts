/**
 * Engine configuration.
 *
 * Usage:
 *   import { loadEngineConfig } from "./config/index.js";
 *
 *   // From environment variables (.env is loaded by dotenv)
 *   const config = loadEngineConfig();
 *
 *   // With explicit overrides
 *   const config = loadEngineConfig({ installRoot: "/srv/tftpboot" });
 */

export {
  ConfigError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  type EnvSource,
} from "./env.js";

export {
  EngineConfigSchema,
  LogLevelSchema,
  RuntimeEnvSchema,
  type EngineConfig,
  type EngineConfigInput,
} from "./schema.js";

export {
  loadEngineConfig,
  parseEngineConfig,
  readEngineEnv,
  formatZodIssues,
  deepFreeze,
  EngineConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_ENGINE_CONFIG } from "./defaults.js";
