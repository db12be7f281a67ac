/**
 * Provision CLI — Shared Options
 *
 * Group selection flags shared by `install` and `status`, and the
 * argument parsers for numeric options.
 */

import { Command, InvalidArgumentError } from "commander";
import { DEFAULT_MANIFEST } from "@provision/catalog";
import { isManagerType } from "@provision/engine";
import type { CliConfig } from "./config";
import type { PlanOptions } from "./plan";
import { printWarn } from "./output";

export interface SelectionOptions {
  manifest: string;
  skip?: string[];
  skipBrew?: boolean;
  skipPython?: boolean;
  skipNode?: boolean;
  concurrency?: number;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Must be a whole number of at least 1.");
  }
  return n;
}

export function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Must be a whole number of at least 0.");
  }
  return n;
}

/**
 * Register --manifest, --skip, --skip-brew/python/node and --concurrency.
 */
export function addSelectionOptions(command: Command): Command {
  return command
    .option("-m, --manifest <name|path>", "Bundled manifest name or path to a YAML file", DEFAULT_MANIFEST)
    .option("--skip <managers...>", "Leave out groups using these package managers")
    .option("--skip-brew", "Skip Homebrew formulae and casks")
    .option("--skip-python", "Skip Python packages")
    .option("--skip-node", "Skip global npm packages")
    .option("-c, --concurrency <n>", "Packages in flight at once, for every group", parsePositiveInt);
}

/**
 * Merge selection flags with environment defaults. Flags win.
 */
export function toPlanOptions(
  groups: string[],
  opts: SelectionOptions,
  config: CliConfig,
): PlanOptions {
  for (const manager of opts.skip ?? []) {
    if (!isManagerType(manager)) {
      printWarn(`--skip ${manager}: not a known package manager, ignoring.`);
    }
  }

  return {
    groups,
    skip: opts.skip,
    skipBrew: opts.skipBrew,
    skipPython: opts.skipPython,
    skipNode: opts.skipNode,
    concurrency: opts.concurrency ?? config.concurrency,
    attempts: config.attempts,
    backoffMs: config.backoffMs,
  };
}
