/**
 * Provision Engine — pip Installer
 *
 * Installs into whichever environment `pipCommand` belongs to. Point it at
 * a virtualenv's pip (see ensureVirtualenv) to keep packages out of the
 * system interpreter, which recent Homebrew Pythons refuse to modify.
 */

import * as path from "path";
import { Target } from "../types";
import { ProvisionError } from "../errors";
import { BaseInstaller, InstallCommand, InstallerOptions } from "./base-installer";
import { execRunner } from "./command-runner";
import { summarizeOutput } from "./classify";

export interface PipInstallerOptions extends InstallerOptions {
  /** pip executable, default "pip3" */
  pipCommand?: string;
}

export class PipInstaller extends BaseInstaller {
  readonly manager = "pip" as const;
  private readonly pip: string;

  constructor(options: PipInstallerOptions = {}) {
    super(options);
    this.pip = options.pipCommand ?? "pip3";
  }

  isPresent(target: Target): Promise<boolean> {
    return this.succeeds(this.pip, ["show", "--quiet", target.id]);
  }

  installCommand(target: Target): InstallCommand {
    return {
      file: this.pip,
      args: ["install", target.source ?? target.id, "--no-cache-dir"],
    };
  }
}

// ─── Virtualenv ─────────────────────────────────────────────────

export interface VirtualenvOptions extends InstallerOptions {
  /** Interpreter that creates the environment, default "python3" */
  python?: string;
}

export interface Virtualenv {
  dir: string;
  pip: string;
  /** False when an existing environment was reused */
  created: boolean;
}

export function virtualenvPip(dir: string): string {
  return path.join(dir, "bin", "pip");
}

/**
 * Reuse the virtualenv at `dir`, or create it with `python -m venv` and
 * upgrade its pip. A failed pip upgrade is ignored.
 *
 * @throws ProvisionError if the environment cannot be created
 */
export async function ensureVirtualenv(
  dir: string,
  options: VirtualenvOptions = {},
): Promise<Virtualenv> {
  const runner = options.runner ?? execRunner;
  const pip = virtualenvPip(dir);

  const existing = await runner(pip, ["--version"]);
  if (existing.exitCode === 0) return { dir, pip, created: false };

  const created = await runner(options.python ?? "python3", ["-m", "venv", dir]);
  if (created.exitCode !== 0) {
    throw new ProvisionError(
      "VIRTUALENV_FAILED",
      `Could not create a virtualenv at ${dir}: ${summarizeOutput(created)}`,
    );
  }

  await runner(pip, ["install", "--upgrade", "pip"]);
  return { dir, pip, created: true };
}
