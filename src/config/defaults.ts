import type { EngineConfigInput } from "./schema.js";

export const DEFAULT_ENGINE_CONFIG: EngineConfigInput = {
  env: "development",
  logLevel: "info",
  appName: "bootenv-engine",
  installRoot: "/tftpboot",
  provisionerUrl: "http://127.0.0.1:8091",
  commandUrl: "https://127.0.0.1:3000",
  tenantId: 1,
  extractCommand: "/explode_iso.sh",
  logDir: "output/logs",
  logToFile: false,
};
