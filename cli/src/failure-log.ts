/**
 * Provision CLI — Failure Log
 *
 * Appends one plain-text line per failed package so a long unattended run
 * leaves a record that survives the terminal:
 *
 *   [2026-03-01 14:02:11] ERROR: Failed to install jq after 3 attempt(s): <reason>
 *   [2026-03-01 14:02:12] CANCELLED: fd was not installed (0 attempt(s) made)
 *
 * The file is append-only and never rotated.
 */

import * as fs from "fs";
import * as path from "path";
import type { FailureRecord } from "@provision/engine";

const pad = (n: number) => String(n).padStart(2, "0");

/**
 * Local time as "YYYY-MM-DD HH:MM:SS".
 */
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatFailureLine(failure: FailureRecord, date: Date): string {
  if (failure.cancelled) {
    return (
      `[${formatLogTimestamp(date)}] CANCELLED: ${failure.target.id} was not installed ` +
      `(${failure.attempts} attempt(s) made)`
    );
  }
  // Multi-line reasons would break the one-line-per-failure format
  const reason = failure.reason.replace(/\s*\r?\n\s*/g, " ").trim();
  return (
    `[${formatLogTimestamp(date)}] ERROR: Failed to install ${failure.target.id} ` +
    `after ${failure.attempts} attempt(s): ${reason}`
  );
}

/**
 * Append every failure to the log file, creating it (and its directory)
 * if needed. Does nothing for an empty list.
 */
export function appendFailures(
  logFile: string,
  failures: readonly FailureRecord[],
  date: Date = new Date(),
): void {
  if (failures.length === 0) return;
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  const lines = failures.map((f) => formatFailureLine(f, date) + "\n").join("");
  fs.appendFileSync(logFile, lines, "utf-8");
}
