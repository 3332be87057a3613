/**
 * OS availability.
 *
 * Aggregates the install-type boot environments (name ends in "-install")
 * into the set of installable OSes and a default OS for new deployments,
 * and publishes both as inventory attributes.
 */

import { silentLogger, type Logger } from "../logging/logger.js";
import { INSTALL_SUFFIX } from "./media.js";
import type { BootEnvironment } from "./schema.js";

/** Lower rank wins. */
export const PREFERRED_OSES: Readonly<Record<string, number>> = Object.freeze({
  "centos-7.2.1511": 0,
  "centos-7.1.1503": 1,
  "ubuntu-14.04": 2,
  "ubuntu-15.04": 3,
  "debian-8": 4,
  "centos-6.6": 5,
  "debian-7": 6,
  "redhat-6.5": 7,
  "ubuntu-12.04": 8,
});

export const UNRANKED_OS = 999;

/** Default OS reported when no install environment exists. */
export const NO_DEFAULT_OS = "STRING";

export const AVAILABLE_OSES_ATTRIBUTE = "provisioner-available-oses";
export const DEFAULT_OS_ATTRIBUTE = "provisioner-default-os";

export interface OsAvailability {
  /** OS names in first-seen order */
  available: string[];
  defaultOs: string;
}

export function osRank(osName: string): number {
  return Object.hasOwn(PREFERRED_OSES, osName) ? PREFERRED_OSES[osName] : UNRANKED_OS;
}

export function computeOsAvailability(envs: Iterable<BootEnvironment>): OsAvailability {
  const available: string[] = [];
  let defaultOs = NO_DEFAULT_OS;
  let bestRank = UNRANKED_OS + 1;

  for (const env of envs) {
    if (!env.name.endsWith(INSTALL_SUFFIX)) continue;

    const osName = env.os.name;
    if (!available.includes(osName)) available.push(osName);

    const rank = osRank(osName);
    if (rank < bestRank) {
      defaultOs = osName;
      bestRank = rank;
    }
  }

  return { available, defaultOs };
}

/**
 * Sink for inventory attributes, e.g. a client of the orchestration
 * service's attribute API.
 */
export interface AttributePublisher {
  setAttribute(id: string, value: unknown): Promise<void>;
}

/**
 * Publish the available OS set (as a map of name → true) and the default
 * OS.
 */
export async function publishOsAttributes(
  envs: Iterable<BootEnvironment>,
  publisher: AttributePublisher,
  logger: Logger = silentLogger
): Promise<OsAvailability> {
  const availability = computeOsAvailability(envs);
  const oses = Object.fromEntries(availability.available.map((name) => [name, true]));

  await publisher.setAttribute(AVAILABLE_OSES_ATTRIBUTE, oses);
  await publisher.setAttribute(DEFAULT_OS_ATTRIBUTE, availability.defaultOs);

  logger.info("Published OS availability", {
    available: availability.available,
    defaultOs: availability.defaultOs,
  });
  return availability;
}
