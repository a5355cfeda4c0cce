/**
 * Run ID generation and management.
 * Each CLI invocation gets a run ID that tags every log entry.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize a new run ID. Called once at startup.
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

/**
 * Clear the current run ID.
 */
export function resetRunId(): void {
  currentRunId = null;
}
