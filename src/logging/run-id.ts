/**
 * Run ID generation and management.
 * Each execution gets a run ID so log lines from one process can be grouped.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: UTC date + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize the run ID for this execution, either from an explicit value
 * (e.g. CRT_RUN_ID) or a freshly generated one. Call once at startup.
 */
export function initRunId(explicit?: string): string {
  currentRunId = explicit ?? generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
