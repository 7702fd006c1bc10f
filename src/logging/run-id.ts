/**
 * Run ID generation and management.
 * Each validation gets a unique run ID so log lines, run folders and
 * comparison records can be correlated.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: UTC date + time + random suffix (e.g., "20240115-093012-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const iso = now.toISOString();
  const datePart = iso.slice(0, 10).replace(/-/g, "");
  const timePart = iso.slice(11, 19).replace(/:/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${timePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize a new run ID for this execution.
 * Should be called once at startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null if not initialized.
 */
export function getRunId(): string | null {
  return currentRunId;
}
