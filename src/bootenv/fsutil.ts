import { stat } from "node:fs/promises";
import type { Stats } from "node:fs";

function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}

/**
 * stat() that returns undefined for a missing path instead of throwing.
 * Other failures (permissions, I/O) still throw.
 */
export async function statIfExists(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path);
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }
}

export async function pathExists(path: string): Promise<boolean> {
  return (await statIfExists(path)) !== undefined;
}
