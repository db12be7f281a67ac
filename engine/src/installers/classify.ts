/**
 * Provision Engine — Failure Classification
 *
 * Turns a failed command into a structured InstallFailure. This is the
 * only place that looks at package-manager output text; the dispatcher
 * just reads the flags set here.
 */

import { InstallFailure } from "../types";
import { CommandResult, EXIT_COMMAND_NOT_FOUND } from "./command-runner";

export type FailureCategory =
  | "already_exists"
  | "not_found"
  | "externally_managed"
  | "busy"
  | "network"
  | "permission"
  | "missing_manager"
  | "unknown";

export interface FailurePattern {
  pattern: RegExp;
  category: FailureCategory;
  /** Whether another attempt could plausibly succeed */
  retryable: boolean;
}

/**
 * Known failure signatures, checked in order against stderr + stdout.
 */
export const FAILURE_PATTERNS: readonly FailurePattern[] = [
  {
    // brew casks: the .app was dragged in by hand or came from another source
    pattern: /It seems there is already an App at/i,
    category: "already_exists",
    retryable: false,
  },
  {
    // cargo: a binary of the same name from another crate
    pattern: /binary `[^`]+` already exists in destination/i,
    category: "already_exists",
    retryable: false,
  },
  {
    // brew, pip: "Warning: jq 1.7.1 is already installed"
    pattern: /\balready installed\b/i,
    category: "already_exists",
    retryable: false,
  },
  {
    pattern:
      /No available formula|No formulae or casks found|No Cask with this name|Cask '[^']+' is unavailable/i,
    category: "not_found",
    retryable: false,
  },
  {
    pattern:
      /npm ERR! code E404|npm error code E404|No matching distribution found|could not find `[^`]+` in registry|Extension '[^']+' not found|cannot find module providing package/i,
    category: "not_found",
    retryable: false,
  },
  {
    pattern: /No matching version|404 Not Found/i,
    category: "not_found",
    retryable: false,
  },
  {
    // PEP 668: pip refuses to touch a Homebrew or distro interpreter
    pattern: /externally-managed-environment/i,
    category: "externally_managed",
    retryable: false,
  },
  {
    pattern:
      /Another active Homebrew process|has already locked|Resource temporarily unavailable|EBUSY|Waiting for cache lock/i,
    category: "busy",
    retryable: true,
  },
  {
    pattern:
      /Could not resolve host|ETIMEDOUT|ECONNRESET|EAI_AGAIN|ENOTFOUND|Connection refused|Failed to download|operation timed out/i,
    category: "network",
    retryable: true,
  },
  {
    pattern: /Permission denied|EACCES|Operation not permitted/i,
    category: "permission",
    retryable: false,
  },
];

/**
 * Find the first known pattern in a command's output.
 */
export function matchFailurePattern(output: string): FailurePattern | null {
  for (const entry of FAILURE_PATTERNS) {
    if (entry.pattern.test(output)) return entry;
  }
  return null;
}

/**
 * Last non-empty line of stderr, falling back to stdout, then the exit code.
 */
export function summarizeOutput(result: CommandResult): string {
  for (const stream of [result.stderr, result.stdout]) {
    const lines = stream
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    if (lines.length > 0) return lines[lines.length - 1];
  }
  return `exited with code ${result.exitCode}`;
}

export function categorizeFailure(result: CommandResult): FailurePattern {
  if (result.exitCode === EXIT_COMMAND_NOT_FOUND) {
    return { pattern: /command not found/, category: "missing_manager", retryable: false };
  }
  return (
    matchFailurePattern(`${result.stderr}\n${result.stdout}`) ?? {
      pattern: /.*/,
      category: "unknown",
      retryable: true,
    }
  );
}

/**
 * Build the InstallFailure for a non-zero exit.
 */
export function classifyFailure(result: CommandResult): InstallFailure {
  const { category, retryable } = categorizeFailure(result);
  return {
    reason: summarizeOutput(result),
    alreadyExists: category === "already_exists",
    retryable,
    exitCode: result.exitCode,
  };
}
