/**
 * Provision Engine — Base Installer
 *
 * Every package-manager adapter (brew, cask, npm, pip, cargo, go, vscode)
 * extends this class. Adapters only know how to ask "is it there?" and
 * "install it"; retries, concurrency and reporting are the engine's job.
 */

import { Installer, InstallResult, Target } from "../types";
import { CommandOptions, CommandRunner, execRunner } from "./command-runner";
import { classifyFailure } from "./classify";

export type ManagerType =
  | "brew"
  | "cask"
  | "npm"
  | "pip"
  | "cargo"
  | "go"
  | "vscode";

export interface InstallCommand {
  file: string;
  args: string[];
  env?: Record<string, string>;
}

export interface InstallerOptions {
  /** Defaults to a child_process-backed runner */
  runner?: CommandRunner;
}

export abstract class BaseInstaller implements Installer {
  abstract readonly manager: ManagerType;
  protected readonly runner: CommandRunner;

  constructor(options: InstallerOptions = {}) {
    this.runner = options.runner ?? execRunner;
  }

  abstract isPresent(target: Target): Promise<boolean>;

  /**
   * The command that installs one target.
   */
  abstract installCommand(target: Target): InstallCommand;

  async install(target: Target): Promise<InstallResult> {
    const command = this.installCommand(target);
    const result = await this.runner(command.file, command.args, {
      env: command.env,
    });

    if (result.exitCode === 0) return { success: true };
    return { success: false, failure: classifyFailure(result) };
  }

  /**
   * True when the command exits 0.
   */
  protected async succeeds(
    file: string,
    args: string[],
    options?: CommandOptions,
  ): Promise<boolean> {
    const result = await this.runner(file, args, options);
    return result.exitCode === 0;
  }

  /**
   * Non-empty, trimmed stdout lines of a command, or [] if it failed.
   */
  protected async listLines(file: string, args: string[]): Promise<string[]> {
    const result = await this.runner(file, args);
    if (result.exitCode !== 0) return [];
    return result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }
}
