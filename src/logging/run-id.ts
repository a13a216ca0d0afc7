/**
 * Run ID generation and management.
 * Every merge run gets an ID that tags its log entries and JSON report.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short run ID: UTC date plus random hex (e.g. "20240115-a1b2c3").
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Start a new run. Call once at startup, before the first log entry.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
