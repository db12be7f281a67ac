/**
 * Provision Engine — Cargo Installer
 */

import { Target } from "../types";
import { BaseInstaller, InstallCommand } from "./base-installer";

/** Crate header lines of `cargo install --list`, e.g. "ripgrep v14.1.0:" */
const CRATE_LINE = /^(\S+) v\S+(?: \([^)]*\))?:$/;

/**
 * Crate names from `cargo install --list` output. Indented lines are the
 * binaries each crate provides and are skipped.
 */
export function parseCargoInstallList(stdout: string): string[] {
  const crates: string[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const match = CRATE_LINE.exec(line);
    if (match) crates.push(match[1]);
  }
  return crates;
}

export class CargoInstaller extends BaseInstaller {
  readonly manager = "cargo" as const;

  async isPresent(target: Target): Promise<boolean> {
    const result = await this.runner("cargo", ["install", "--list"]);
    if (result.exitCode !== 0) return false;
    return parseCargoInstallList(result.stdout).includes(target.id);
  }

  installCommand(target: Target): InstallCommand {
    return { file: "cargo", args: ["install", target.source ?? target.id] };
  }
}
