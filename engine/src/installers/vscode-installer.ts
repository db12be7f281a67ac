/**
 * Provision Engine — VS Code Extension Installer
 *
 * Extension ids are case-insensitive (`GitHub.copilot` is listed as
 * `github.copilot`), so presence compares lowercased ids.
 */

import { Target } from "../types";
import { BaseInstaller, InstallCommand, InstallerOptions } from "./base-installer";

export interface VscodeInstallerOptions extends InstallerOptions {
  /** CLI launcher, default "code" */
  codeCommand?: string;
}

export class VscodeExtensionInstaller extends BaseInstaller {
  readonly manager = "vscode" as const;
  private readonly code: string;

  constructor(options: VscodeInstallerOptions = {}) {
    super(options);
    this.code = options.codeCommand ?? "code";
  }

  async isPresent(target: Target): Promise<boolean> {
    const installed = await this.listLines(this.code, ["--list-extensions"]);
    const wanted = target.id.toLowerCase();
    return installed.some((ext) => ext.toLowerCase() === wanted);
  }

  installCommand(target: Target): InstallCommand {
    return { file: this.code, args: ["--install-extension", target.id] };
  }
}
