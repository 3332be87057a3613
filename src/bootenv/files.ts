/**
 * Auxiliary OS files.
 *
 * Each FileRef on the OS descriptor is validated at its resolved disk path.
 * An invalid file is fetched from its URL and validated again; a second
 * failure is fatal. Files that already validate are never downloaded.
 */

import { mkdir, open, rename, rm } from "node:fs/promises";
import { posix } from "node:path";

import { ProvisionerError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { statIfExists } from "./fsutil.js";
import { pathFor, type PathConfig } from "./paths.js";
import type { BootEnvironment, FileRef } from "./schema.js";

export class FileFetchFailedError extends ProvisionerError {
  readonly code = "FILE_FETCH_FAILED";

  constructor(
    public readonly bootEnv: string,
    public readonly url: string,
    public readonly destination: string,
    options?: { cause?: unknown }
  ) {
    super(`Boot environment ${bootEnv}: unable to fetch ${url} to ${destination}`, options);
  }
}

export class HttpStatusError extends ProvisionerError {
  readonly code = "HTTP_STATUS";

  constructor(
    public readonly url: string,
    public readonly status: number,
    statusText: string
  ) {
    super(`GET ${url}: ${status} ${statusText}`);
  }
}

export interface FileFetcher {
  /** Download `url` to `destination`, replacing any existing file. */
  fetch(url: string, destination: string): Promise<void>;
}

/**
 * Streams the response body of a GET request to disk.
 *
 * The body is written to a temporary file beside `destination` and renamed
 * into place once complete, so an interrupted download never leaves a file
 * at `destination`.
 */
export class HttpFileFetcher implements FileFetcher {
  async fetch(url: string, destination: string): Promise<void> {
    const response = await fetch(url);
    if (!response.ok || response.body === null) {
      await response.body?.cancel();
      throw new HttpStatusError(url, response.status, response.statusText);
    }

    await mkdir(posix.dirname(destination), { recursive: true });
    const partial = `${destination}.part`;
    const reader = response.body.getReader();
    try {
      const handle = await open(partial, "w");
      try {
        for (;;) {
          const chunk = await reader.read();
          if (chunk.done) break;
          try {
            await handle.write(chunk.value);
          } catch (err) {
            await reader.cancel(err);
            throw err;
          }
        }
      } finally {
        await handle.close();
      }
      await rename(partial, destination);
    } catch (err) {
      await rm(partial, { force: true });
      throw err;
    }
  }
}

/**
 * Whether the file at `path` passes the reference's validation method.
 * Only existence of a regular file is checked today.
 */
export async function validateFile(file: FileRef, path: string): Promise<boolean> {
  switch (file.validationMethod) {
    case "":
    case "exists": {
      const stats = await statIfExists(path);
      return stats !== undefined && stats.isFile();
    }
  }
}

export type FileOutcome = "valid" | "fetched";

export interface FileDeps {
  config: PathConfig;
  fetcher: FileFetcher;
  logger?: Logger;
}

/**
 * Make sure every auxiliary file of the OS is present, fetching the missing
 * ones in declaration order.
 *
 * @returns the outcome per file, keyed by destination path
 * @throws FileFetchFailedError if a file is still invalid after fetching
 */
export async function ensureOsFiles(
  env: BootEnvironment,
  deps: FileDeps
): Promise<Map<string, FileOutcome>> {
  const logger = (deps.logger ?? silentLogger).child({ bootEnv: env.name });
  const outcomes = new Map<string, FileOutcome>();

  for (const file of env.os.files) {
    const destination = pathFor(env, "disk", file.name, deps.config);

    if (await validateFile(file, destination)) {
      outcomes.set(destination, "valid");
      continue;
    }

    logger.info("Files: fetching", { url: file.url, destination });
    let fetchError: unknown;
    try {
      await deps.fetcher.fetch(file.url, destination);
    } catch (err) {
      fetchError = err;
    }

    if (fetchError !== undefined || !(await validateFile(file, destination))) {
      throw new FileFetchFailedError(
        env.name,
        file.url,
        destination,
        fetchError === undefined ? undefined : { cause: fetchError }
      );
    }
    outcomes.set(destination, "fetched");
  }

  return outcomes;
}
