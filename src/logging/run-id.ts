/**
 * The ID of the current research run.
 *
 * Every log line carries it. The date part is UTC; artifact names use
 * local time, so the researcher logs the artifact timestamp alongside.
 */

import { randomBytes } from "node:crypto";

let current: string | null = null;

/** `YYYYMMDD-xxxxxx`: the UTC date and six random hex digits. */
export function generateRunId(now: Date = new Date()): string {
  const day = now.toISOString().slice(0, 10).replaceAll("-", "");
  return `${day}-${randomBytes(3).toString("hex")}`;
}

/** Starts a run under the given ID (a caller's request ID, say) or a fresh one. */
export function initRunId(runId: string = generateRunId()): string {
  current = runId;
  return current;
}

/** null until the first run starts. */
export function getRunId(): string | null {
  return current;
}
