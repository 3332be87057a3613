/**
 * Engine configuration schema.
 *
 * The install root and the network-facing base URLs travel as one frozen
 * value that every component receives explicitly: the path resolver needs
 * the install root and the provisioner URL, the render context needs both
 * URLs and the tenant, and the media preparer needs the extraction command.
 */

import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const RuntimeEnvSchema = z.enum(["development", "production", "test"]);

/** A base URL with any trailing slashes removed. */
const BaseUrl = z
  .string()
  .url()
  .transform((url) => url.replace(/\/+$/, ""));

export const EngineConfigSchema = z
  .object({
    /** Current environment (development, production, test) */
    env: RuntimeEnvSchema,

    logLevel: LogLevelSchema,

    appName: z.string().min(1),

    /** Directory under which install trees and rendered artifacts live */
    installRoot: z
      .string()
      .min(1)
      .refine((p) => p.startsWith("/"), "installRoot must be an absolute path"),

    /** Base URL machines fetch boot artifacts from */
    provisionerUrl: BaseUrl,

    /** Base URL machines call back to for command and control */
    commandUrl: BaseUrl,

    tenantId: z.number().int().min(0),

    /** External procedure invoked as `<cmd> <osName> <isoPath> <canaryDir>` */
    extractCommand: z.string().min(1),

    logDir: z.string().min(1),

    logToFile: z.boolean(),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/** Raw configuration shape accepted before validation. */
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
