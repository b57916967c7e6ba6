/**
 * Job ID generation.
 * Every render or print request gets its own id so log lines from
 * concurrent requests can be told apart.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique job ID.
 * Format: date prefix + random suffix (e.g., "20261019-a1b2c3")
 */
export function generateJobId(): string {
  const now = new Date();
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}
