/**
 * Run ID generation and management.
 * Each install or generate invocation gets its own ID so that log lines
 * from a long toolchain build can be told apart from earlier attempts.
 */

import { randomBytes } from "node:crypto";

export type RunKind = "install" | "generate";

/**
 * Generate a short, unique run ID.
 * Format: kind + date + random suffix (e.g., "install-20240115-a1b2c3")
 */
export function generateRunId(kind: RunKind): string {
  const datePart = new Date().toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${kind}-${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize a new run ID for this execution.
 * Called once by each CLI entry point.
 */
export function initRunId(kind: RunKind): string {
  currentRunId = generateRunId(kind);
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
