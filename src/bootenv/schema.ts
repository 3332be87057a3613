/**
 * Boot environment definition schema.
 *
 * Definitions arrive as PascalCase JSON records:
 *
 *   {
 *     "Name": "ubuntu-16.04-install",
 *     "OS": { "Name": "ubuntu-16.04", "IsoFile": "ubuntu-16.04-server-amd64.iso",
 *             "IsoSha256": "…" },
 *     "Kernel": "install/netboot/ubuntu-installer/amd64/linux",
 *     "Initrds": ["install/netboot/ubuntu-installer/amd64/initrd.gz"],
 *     "BootParams": "debian-installer/locale=en_US.utf8 url={{ .Machine.Url }}/seed",
 *     "RequiredParams": ["dns-domain"],
 *     "Templates": [
 *       { "Name": "pxelinux", "Path": "pxelinux.cfg/{{ .Machine.HexAddress }}",
 *         "UUID": "default-pxelinux.tmpl" }
 *     ]
 *   }
 *
 * and are mapped to the camelCase BootEnvironment type. Compiled templates
 * are derived state and are never part of this type or its serialized form;
 * see compiler.ts.
 *
 * Template entries are only shape-checked here. Empty names, paths or
 * content ids are structural errors reported by the lifecycle controller.
 */

import { z } from "zod";

import { ProvisionerError } from "../errors.js";
import { formatZodIssues, type ConfigValidationIssue } from "../config/loader.js";

// ---------------------------------------------------------------------------
// Wire schema
// ---------------------------------------------------------------------------

export const FileRefSchema = z
  .object({
    URL: z.string().url(),
    /** Destination file name inside the install tree */
    Name: z.string().min(1),
    ValidationURL: z.string().default(""),
    /** Only existence checks are implemented */
    ValidationMethod: z.enum(["", "exists"]).default(""),
  })
  .strict();

export const OsInfoSchema = z
  .object({
    Name: z.string().min(1),
    Family: z.string().default(""),
    Codename: z.string().default(""),
    Version: z.string().default(""),
    IsoFile: z.string().default(""),
    IsoSha256: z
      .string()
      .regex(/^([0-9a-fA-F]{64})?$/, "IsoSha256 must be 64 hex digits")
      .default(""),
    IsoUrl: z.string().default(""),
    Files: z.array(FileRefSchema).default([]),
  })
  .strict();

export const TemplateSpecSchema = z
  .object({
    Name: z.string(),
    /** Template text producing the destination path */
    Path: z.string(),
    /** Identifier of the content template in the template store */
    UUID: z.string(),
  })
  .strict();

export const BootEnvRecordSchema = z
  .object({
    Name: z.string().min(1),
    OS: OsInfoSchema,
    Templates: z.array(TemplateSpecSchema).default([]),
    Kernel: z.string().default(""),
    Initrds: z.array(z.string().min(1)).default([]),
    BootParams: z.string().default(""),
    RequiredParams: z.array(z.string().min(1)).default([]),
    TenantId: z.number().int().min(0).optional(),
  })
  .strict();

export type BootEnvRecord = z.input<typeof BootEnvRecordSchema>;

// ---------------------------------------------------------------------------
// Domain types
// ---------------------------------------------------------------------------

export interface FileRef {
  readonly url: string;
  readonly name: string;
  readonly validationUrl: string;
  readonly validationMethod: "" | "exists";
}

export interface OsInfo {
  /** Install-tree directory name and install URL segment */
  readonly name: string;
  readonly family: string;
  readonly codename: string;
  readonly version: string;
  readonly isoFile: string;
  readonly isoSha256: string;
  readonly isoUrl: string;
  readonly files: readonly FileRef[];
}

export interface TemplateSpec {
  /** Logical role: "pxelinux", "elilo", "ipxe", … */
  readonly name: string;
  readonly path: string;
  readonly contentId: string;
}

export interface BootEnvironment {
  readonly name: string;
  readonly os: OsInfo;
  readonly templates: readonly TemplateSpec[];
  /** Partial path of the kernel inside the install tree */
  readonly kernel: string;
  readonly initrds: readonly string[];
  /** Template producing the full kernel command line */
  readonly bootParams: string;
  readonly requiredParams: readonly string[];
  /** Tenant the environment belongs to; the engine default when unset */
  readonly tenantId?: number;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class BootEnvValidationError extends ProvisionerError {
  readonly code = "BOOTENV_INVALID";

  constructor(
    message: string,
    public readonly issues: ConfigValidationIssue[]
  ) {
    super(message);
  }

  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

/**
 * Validate a definition record and map it to a BootEnvironment.
 *
 * @throws BootEnvValidationError
 */
export function parseBootEnv(input: unknown): BootEnvironment {
  const result = BootEnvRecordSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new BootEnvValidationError(
      `Invalid boot environment definition: ${issues.length} validation error(s)`,
      issues
    );
  }

  const r = result.data;
  return {
    name: r.Name,
    os: {
      name: r.OS.Name,
      family: r.OS.Family,
      codename: r.OS.Codename,
      version: r.OS.Version,
      isoFile: r.OS.IsoFile,
      isoSha256: r.OS.IsoSha256.toLowerCase(),
      isoUrl: r.OS.IsoUrl,
      files: r.OS.Files.map((f) => ({
        url: f.URL,
        name: f.Name,
        validationUrl: f.ValidationURL,
        validationMethod: f.ValidationMethod,
      })),
    },
    templates: r.Templates.map((t) => ({ name: t.Name, path: t.Path, contentId: t.UUID })),
    kernel: r.Kernel,
    initrds: r.Initrds,
    bootParams: r.BootParams,
    requiredParams: r.RequiredParams,
    tenantId: r.TenantId,
  };
}

/**
 * Map a BootEnvironment back to its definition record. Derived state is
 * never included.
 */
export function serializeBootEnv(env: BootEnvironment): BootEnvRecord {
  const record: BootEnvRecord = {
    Name: env.name,
    OS: {
      Name: env.os.name,
      Family: env.os.family,
      Codename: env.os.codename,
      Version: env.os.version,
      IsoFile: env.os.isoFile,
      IsoSha256: env.os.isoSha256,
      IsoUrl: env.os.isoUrl,
      Files: env.os.files.map((f) => ({
        URL: f.url,
        Name: f.name,
        ValidationURL: f.validationUrl,
        ValidationMethod: f.validationMethod,
      })),
    },
    Templates: env.templates.map((t) => ({ Name: t.name, Path: t.path, UUID: t.contentId })),
    Kernel: env.kernel,
    Initrds: [...env.initrds],
    BootParams: env.bootParams,
    RequiredParams: [...env.requiredParams],
  };
  if (env.tenantId !== undefined) record.TenantId = env.tenantId;
  return record;
}
