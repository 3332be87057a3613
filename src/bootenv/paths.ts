/**
 * Path resolution for boot environment artifacts.
 *
 * Kernel, initrd, auxiliary file and rendered template paths are stored as
 * partial paths relative to the OS install tree. A partial path expands
 * differently per access protocol:
 *
 *   disk     <installRoot>/<segment>/<partial>          (engine-local file)
 *   tftp     <segment>/<partial>                        (TFTP roots are relative)
 *   network  <provisionerUrl>/<segment>/<partial>       (HTTP retrieval)
 *
 * where <segment> is `<os-name>/install`, or just `discovery` for the
 * reserved discovery OS.
 */

import { posix } from "node:path";

import { ProgrammingError } from "../errors.js";
import type { EngineConfig } from "../config/schema.js";
import type { BootEnvironment } from "./schema.js";

export const PROTOCOLS = ["disk", "tftp", "network"] as const;

export type Protocol = (typeof PROTOCOLS)[number];

/** The OS name whose install tree has no `install` subdirectory. */
export const DISCOVERY_OS = "discovery";

export type PathConfig = Pick<EngineConfig, "installRoot" | "provisionerUrl">;

export class UnknownProtocolError extends ProgrammingError {
  readonly code = "UNKNOWN_PROTOCOL";

  constructor(public readonly protocol: string) {
    super(`Unknown protocol "${protocol}" (expected one of: ${PROTOCOLS.join(", ")})`);
  }
}

/**
 * Normalize a protocol tag. `http` is accepted as an alias of `network`.
 *
 * @throws UnknownProtocolError for any other tag
 */
export function toProtocol(tag: string): Protocol {
  if (tag === "http") return "network";
  const match = PROTOCOLS.find((p) => p === tag);
  if (match === undefined) {
    throw new UnknownProtocolError(tag);
  }
  return match;
}

/**
 * Directory of the OS install tree relative to the install root.
 */
export function installSegment(osName: string): string {
  return osName === DISCOVERY_OS ? osName : posix.join(osName, "install");
}

/**
 * Expand a partial path for one access protocol.
 *
 * @throws UnknownProtocolError if `protocol` is not a known tag
 */
export function pathFor(
  env: Pick<BootEnvironment, "os">,
  protocol: string,
  partial: string,
  config: PathConfig
): string {
  const relative = posix.join(installSegment(env.os.name), partial);

  switch (toProtocol(protocol)) {
    case "disk":
      return posix.join(config.installRoot, relative);
    case "tftp":
      return relative;
    case "network":
      return `${config.provisionerUrl}/${relative}`;
  }
}

/**
 * All initrds of the environment, expanded for `protocol` and joined with
 * spaces (the form kernel command lines and bootloader configs take).
 */
export function joinInitrds(
  env: Pick<BootEnvironment, "os" | "initrds">,
  protocol: string,
  config: PathConfig
): string {
  toProtocol(protocol);
  return env.initrds.map((initrd) => pathFor(env, protocol, initrd, config)).join(" ");
}

/**
 * Base URL of the OS install tree, used by installers as their mirror.
 */
export function installUrl(env: Pick<BootEnvironment, "os">, config: PathConfig): string {
  return `${config.provisionerUrl}/${posix.join(env.os.name, "install")}`;
}
