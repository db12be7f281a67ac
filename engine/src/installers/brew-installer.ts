/**
 * Provision Engine — Homebrew Installers
 *
 * Formulae and casks share the brew binary but differ in flags. Casks are
 * installed with --no-quarantine so Gatekeeper does not block first launch.
 *
 * Auto-update and post-install cleanup are disabled per invocation; with
 * several installs in flight each would otherwise try to update the tap.
 */

import { Target } from "../types";
import { BaseInstaller, InstallCommand } from "./base-installer";

export const BREW_ENV: Record<string, string> = {
  HOMEBREW_NO_AUTO_UPDATE: "1",
  HOMEBREW_NO_INSTALL_CLEANUP: "1",
  HOMEBREW_NO_ENV_HINTS: "1",
};

export class BrewFormulaInstaller extends BaseInstaller {
  readonly manager = "brew" as const;

  isPresent(target: Target): Promise<boolean> {
    return this.succeeds("brew", ["list", "--formula", target.id], {
      env: BREW_ENV,
    });
  }

  installCommand(target: Target): InstallCommand {
    return { file: "brew", args: ["install", target.id], env: BREW_ENV };
  }
}

export class BrewCaskInstaller extends BaseInstaller {
  readonly manager = "cask" as const;

  isPresent(target: Target): Promise<boolean> {
    return this.succeeds("brew", ["list", "--cask", target.id], {
      env: BREW_ENV,
    });
  }

  installCommand(target: Target): InstallCommand {
    return {
      file: "brew",
      args: ["install", "--cask", "--no-quarantine", target.id],
      env: BREW_ENV,
    };
  }
}
