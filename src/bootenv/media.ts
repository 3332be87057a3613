/**
 * Installation media preparation.
 *
 * Extracts an OS installation ISO into the install tree once. Guarded by,
 * in order:
 *
 *   1. the environment name ends in "-install"    (else skipped)
 *   2. the OS names an ISO file                   (else skipped)
 *   3. the canary marker is absent                (else already extracted)
 *   4. the ISO is staged at <root>/isos/<file>    (else skipped, not an error)
 *
 * then the ISO's SHA-256 is checked when one is configured, and the external
 * extraction procedure is invoked with (osName, isoPath, canaryDir). The
 * procedure writes the canary `.<os-name>.rebar_canary` when it finishes,
 * which makes every later call a no-op.
 */

import { createHash } from "node:crypto";
import { execFile } from "node:child_process";
import { createReadStream } from "node:fs";
import { posix } from "node:path";
import { promisify } from "node:util";

import { ProvisionerError, describeError } from "../errors.js";
import type { EngineConfig } from "../config/schema.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { pathExists } from "./fsutil.js";
import { pathFor } from "./paths.js";
import type { BootEnvironment } from "./schema.js";

const execFileAsync = promisify(execFile);

export const INSTALL_SUFFIX = "-install";
export const CANARY_SUFFIX = ".rebar_canary";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ChecksumMismatchError extends ProvisionerError {
  readonly code = "CHECKSUM_MISMATCH";

  constructor(
    public readonly isoPath: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(
      `ISO checksum bad, re-download image: ${isoPath}: actual ${actual}, expected ${expected}`
    );
  }
}

export class MediaExtractionError extends ProvisionerError {
  readonly code = "MEDIA_EXTRACTION_FAILED";

  constructor(
    public readonly bootEnv: string,
    public readonly isoPath: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Extracting ${isoPath} for ${bootEnv} failed: ${reason}`, options);
  }
}

// ---------------------------------------------------------------------------
// Extraction procedure
// ---------------------------------------------------------------------------

export interface ExtractionRequest {
  osName: string;
  isoPath: string;
  /** Directory the canary marker is written to */
  canaryDir: string;
}

export interface MediaExtractor {
  extract(request: ExtractionRequest): Promise<void>;
}

/**
 * Runs an external command as `<command> <osName> <isoPath> <canaryDir>`.
 */
export class CommandMediaExtractor implements MediaExtractor {
  constructor(private readonly command: string) {}

  async extract(request: ExtractionRequest): Promise<void> {
    await execFileAsync(this.command, [request.osName, request.isoPath, request.canaryDir]);
  }
}

// ---------------------------------------------------------------------------
// Preparation
// ---------------------------------------------------------------------------

export type MediaSkipReason = "not-install" | "no-iso" | "already-extracted" | "iso-missing";

export type MediaOutcome =
  | { status: "skipped"; reason: MediaSkipReason }
  | { status: "extracted"; isoPath: string; canaryPath: string };

export interface MediaDeps {
  config: Pick<EngineConfig, "installRoot" | "provisionerUrl">;
  extractor: MediaExtractor;
  logger?: Logger;
}

export function canaryPathFor(env: BootEnvironment, config: MediaDeps["config"]): string {
  return pathFor(env, "disk", `.${env.os.name}${CANARY_SUFFIX}`, config);
}

export function isoPathFor(env: BootEnvironment, config: MediaDeps["config"]): string {
  return posix.join(config.installRoot, "isos", env.os.isoFile);
}

/**
 * Stream a file through SHA-256 and return the lower-case hex digest.
 */
export async function sha256File(path: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

/**
 * Extract the environment's ISO if it has not been extracted yet.
 *
 * @throws ChecksumMismatchError if the staged ISO does not match isoSha256
 * @throws MediaExtractionError  if the extraction procedure fails
 */
export async function prepareMedia(env: BootEnvironment, deps: MediaDeps): Promise<MediaOutcome> {
  const logger = (deps.logger ?? silentLogger).child({ bootEnv: env.name });

  if (!env.name.endsWith(INSTALL_SUFFIX)) {
    logger.debug("Media: skipping, not an install environment");
    return { status: "skipped", reason: "not-install" };
  }

  if (env.os.isoFile === "") {
    logger.debug("Media: skipping, no ISO image specified");
    return { status: "skipped", reason: "no-iso" };
  }

  const canaryPath = canaryPathFor(env, deps.config);
  if (await pathExists(canaryPath)) {
    logger.debug("Media: skipping, canary in place", { canaryPath });
    return { status: "skipped", reason: "already-extracted" };
  }

  const isoPath = isoPathFor(env, deps.config);
  if (!(await pathExists(isoPath))) {
    logger.info("Media: skipping, ISO not staged yet", { isoPath });
    return { status: "skipped", reason: "iso-missing" };
  }

  if (env.os.isoSha256 !== "") {
    const actual = await sha256File(isoPath);
    if (actual !== env.os.isoSha256.toLowerCase()) {
      throw new ChecksumMismatchError(isoPath, env.os.isoSha256, actual);
    }
  }

  const canaryDir = posix.dirname(canaryPath);
  logger.info("Media: extracting ISO", { isoPath, canaryDir });

  try {
    await deps.extractor.extract({ osName: env.os.name, isoPath, canaryDir });
  } catch (err) {
    throw new MediaExtractionError(env.name, isoPath, describeError(err), { cause: err });
  }

  return { status: "extracted", isoPath, canaryPath };
}
