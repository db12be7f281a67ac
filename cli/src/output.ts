/**
 * Provision CLI — Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 *
 * Install progress and summaries go to stdout; engine logs (pino) go to
 * stderr, so the two never interleave mid-line.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";
import type {
  FailureRecord,
  InstallOutcome,
  OutcomeCounts,
} from "@provision/engine";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  pkg: chalk.bold.white,
  manager: chalk.magenta,
  muted: chalk.gray,
};

// ─── Symbols ────────────────────────────────────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
  skip: chalk.gray("\u2192"), // →
  bullet: chalk.gray("\u2022"), // •
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  console.log(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

export function printDryRun(msg: string): void {
  console.log(colors.warn("[DRY RUN] ") + msg);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

export function printBlank(): void {
  console.log();
}

/**
 * Print an indented detail line (for sub-items under a group).
 */
export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

/**
 * Print a bold header line, e.g.  "Homebrew formulae (brew, 21 packages)"
 */
export function printHeader(msg: string): void {
  console.log();
  console.log(`  ${colors.bold(msg)}`);
  console.log();
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

export interface TableOptions {
  head: string[];
  rows: string[][];
  colWidths?: number[];
}

export function printTable({ head, rows, colWidths }: TableOptions): void {
  const options: Table.TableConstructorOptions = {
    head: head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ["gray"] },
    wordWrap: false,
  };
  if (colWidths) {
    options.colWidths = colWidths;
  }
  const table = new Table(options);
  for (const row of rows) {
    table.push(row);
  }
  console.log(table.toString());
}

// ─── Outcomes ───────────────────────────────────────────────

/**
 * One line per finished package:
 *
 *   ✔ ripgrep installed
 *   ✔ ripgrep installed (attempt 2/3)
 *   → jq already installed
 *   ✖ fd failed after 3 attempt(s): <reason>
 */
export function formatOutcome(outcome: InstallOutcome, maxAttempts?: number): string {
  const name = colors.pkg(outcome.target.label ?? outcome.target.id);

  switch (outcome.kind) {
    case "already_present":
      return `${symbols.skip} ${name} ${colors.dim("already installed")}`;
    case "installed": {
      const retried =
        outcome.attempts > 1
          ? colors.dim(` (attempt ${outcome.attempts}${maxAttempts ? `/${maxAttempts}` : ""})`)
          : "";
      return `${symbols.success} ${name} installed${retried}`;
    }
    case "failed":
      if (outcome.cancelled) {
        return `${symbols.warn}  ${name} ${colors.warn("cancelled")}`;
      }
      return `${symbols.error} ${name} ${colors.error(
        `failed after ${outcome.attempts} attempt(s)`,
      )}: ${outcome.reason}`;
  }
}

/**
 * Plain-text summary, e.g. "12 installed, 30 already present, 1 failed".
 */
export function formatCounts(counts: OutcomeCounts): string {
  const parts = [
    `${counts.installed} installed`,
    `${counts.present} already present`,
    `${counts.failed - counts.cancelled} failed`,
  ];
  if (counts.cancelled > 0) parts.push(`${counts.cancelled} cancelled`);
  return parts.join(", ");
}

export function failureRows(failures: readonly FailureRecord[]): string[][] {
  return failures.map((f) => [
    colors.pkg(f.target.id),
    String(f.attempts),
    f.cancelled ? colors.warn("cancelled") : f.reason,
  ]);
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
