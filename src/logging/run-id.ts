/**
 * Run ID generation and management.
 * Each CLI invocation or control-plane operation gets a run ID that tags
 * every log line it produces.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(): string {
  const datePart = new Date().toISOString().slice(0, 10).replace(/-/g, "");
  return `${datePart}-${randomBytes(3).toString("hex")}`;
}

let currentRunId: string | null = null;

/**
 * Start a new run. Uses `runId` when the caller already has one (for
 * example, a request id from the owning control plane).
 */
export function initRunId(runId?: string): string {
  currentRunId = runId ?? generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId() has been called.
 */
export function getRunId(): string | null {
  return currentRunId;
}
