/**
 * Render context.
 *
 * The value every boot template is rendered against. It is built fresh for
 * each machine × boot environment pair, is frozen, and exposes a curated
 * PascalCase surface rather than the raw domain objects:
 *
 *   .Machine.HexAddress    → hexAddress(machine.address)
 *   .Machine.Url           → <provisionerUrl>/machines/<uuid>
 *   .Env.OS.Name           → env.os.name
 *   .Env.PathFor "tftp" p  → pathFor(env, "tftp", p, config)
 *   .ProvisionerURL        → config.provisionerUrl
 *   .CommandURL            → config.commandUrl
 *   .TenantId              → env.tenantId ?? config.tenantId
 *
 * and three helpers:
 *
 *   .BootParams            the environment's boot-parameter template,
 *                          rendered against this same context
 *   .ParseUrl seg url      scheme, host or path of a URL
 *   .Param key             a machine parameter; fails if absent
 *
 * Adding a value requires two changes: the view interface below and the
 * matching line in buildRenderContext().
 */

import { ProgrammingError, ProvisionerError, describeError } from "../errors.js";
import type { EngineConfig } from "../config/schema.js";
import { hexAddress, machineUrl, type Machine } from "../machines/schema.js";
import { renderTemplate, TemplateEvaluationError } from "../templates/renderer.js";
import { BOOT_PARAMS_TEMPLATE_NAME, type CompiledBootEnvironment } from "./compiler.js";
import { installUrl, joinInitrds, pathFor } from "./paths.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export const URL_SEGMENTS = ["scheme", "host", "path"] as const;

export type UrlSegment = (typeof URL_SEGMENTS)[number];

export class UnsupportedSegmentError extends ProvisionerError {
  readonly code = "UNSUPPORTED_URL_SEGMENT";

  constructor(
    public readonly segment: string,
    public readonly rawUrl: string
  ) {
    super(
      `No way to get URL part "${segment}" from ${rawUrl} (expected one of: ${URL_SEGMENTS.join(", ")})`
    );
  }
}

export class MissingParameterError extends ProvisionerError {
  readonly code = "MISSING_PARAMETER";

  constructor(
    public readonly machineName: string,
    public readonly key: string
  ) {
    super(`No such machine parameter "${key}" on machine ${machineName}`);
  }
}

// ---------------------------------------------------------------------------
// Views
// ---------------------------------------------------------------------------

export interface MachineView {
  readonly Name: string;
  readonly Uuid: string;
  readonly Address: string;
  readonly HexAddress: string;
  readonly Url: string;
  readonly BootEnv: string;
  readonly Params: Readonly<Record<string, unknown>>;
}

export interface FileView {
  readonly URL: string;
  readonly Name: string;
  readonly ValidationURL: string;
  readonly ValidationMethod: string;
}

export interface OsView {
  readonly Name: string;
  readonly Family: string;
  readonly Codename: string;
  readonly Version: string;
  readonly IsoFile: string;
  readonly IsoSha256: string;
  readonly IsoUrl: string;
  readonly Files: readonly FileView[];
}

export interface EnvView {
  readonly Name: string;
  readonly OS: OsView;
  readonly Kernel: string;
  readonly Initrds: readonly string[];
  /** Raw boot-parameter template source */
  readonly BootParams: string;
  readonly RequiredParams: readonly string[];
  readonly InstallUrl: string;
  PathFor(protocol: string, partial: string): string;
  JoinInitrds(protocol: string): string;
}

export interface RenderContext {
  readonly Machine: MachineView;
  readonly Env: EnvView;
  readonly ProvisionerURL: string;
  readonly CommandURL: string;
  readonly TenantId: number;
  BootParams(): string;
  ParseUrl(segment: string, rawUrl: string): string;
  Param(key: string): unknown;
}

export type RenderConfig = Pick<
  EngineConfig,
  "installRoot" | "provisionerUrl" | "commandUrl" | "tenantId"
>;

export interface RenderContextInput {
  machine: Machine;
  compiled: CompiledBootEnvironment;
  config: RenderConfig;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isUrlSegment(segment: string): segment is UrlSegment {
  return URL_SEGMENTS.some((s) => s === segment);
}

/**
 * Extract one segment of a URL. The scheme is returned without its trailing
 * colon and the host includes any port.
 *
 * @throws UnsupportedSegmentError  for a segment other than scheme/host/path
 * @throws TemplateEvaluationError  if `rawUrl` does not parse
 */
export function parseUrlSegment(segment: string, rawUrl: string): string {
  if (!isUrlSegment(segment)) {
    throw new UnsupportedSegmentError(segment, rawUrl);
  }

  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch (err) {
    throw new TemplateEvaluationError("ParseUrl", `invalid URL: ${rawUrl}`, undefined, {
      cause: err,
    });
  }

  switch (segment) {
    case "scheme":
      return url.protocol.replace(/:$/, "");
    case "host":
      return url.host;
    case "path":
      return url.pathname;
  }
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Build the frozen render context for one machine and boot environment.
 */
export function buildRenderContext(input: RenderContextInput): RenderContext {
  const { machine, compiled, config } = input;
  const { env } = compiled;

  const machineView: MachineView = Object.freeze({
    Name: machine.name,
    Uuid: machine.uuid,
    Address: machine.address,
    HexAddress: hexAddress(machine.address),
    Url: machineUrl(machine, config.provisionerUrl),
    BootEnv: machine.bootEnv,
    Params: machine.params,
  });

  const envView: EnvView = Object.freeze({
    Name: env.name,
    OS: Object.freeze({
      Name: env.os.name,
      Family: env.os.family,
      Codename: env.os.codename,
      Version: env.os.version,
      IsoFile: env.os.isoFile,
      IsoSha256: env.os.isoSha256,
      IsoUrl: env.os.isoUrl,
      Files: env.os.files.map((f) =>
        Object.freeze({
          URL: f.url,
          Name: f.name,
          ValidationURL: f.validationUrl,
          ValidationMethod: f.validationMethod,
        })
      ),
    }),
    Kernel: env.kernel,
    Initrds: env.initrds,
    BootParams: env.bootParams,
    RequiredParams: env.requiredParams,
    InstallUrl: installUrl(env, config),
    PathFor: (protocol: string, partial: string) => pathFor(env, protocol, partial, config),
    JoinInitrds: (protocol: string) => joinInitrds(env, protocol, config),
  });

  let renderingBootParams = false;

  const context: RenderContext = Object.freeze({
    Machine: machineView,
    Env: envView,
    ProvisionerURL: config.provisionerUrl,
    CommandURL: config.commandUrl,
    TenantId: env.tenantId ?? config.tenantId,

    BootParams: (): string => {
      const template = compiled.bootParams;
      if (!template) return "";
      if (renderingBootParams) {
        throw new TemplateEvaluationError(
          BOOT_PARAMS_TEMPLATE_NAME,
          "boot parameters cannot reference .BootParams"
        );
      }

      renderingBootParams = true;
      try {
        return renderTemplate(template, context);
      } catch (err) {
        if (err instanceof TemplateEvaluationError || err instanceof ProgrammingError) throw err;
        throw new TemplateEvaluationError(
          BOOT_PARAMS_TEMPLATE_NAME,
          describeError(err),
          undefined,
          { cause: err }
        );
      } finally {
        renderingBootParams = false;
      }
    },

    ParseUrl: (segment: string, rawUrl: string): string => parseUrlSegment(segment, rawUrl),

    Param: (key: string): unknown => {
      if (!Object.hasOwn(machine.params, key)) {
        throw new MissingParameterError(machine.name, key);
      }
      return machine.params[key];
    },
  });

  return context;
}
