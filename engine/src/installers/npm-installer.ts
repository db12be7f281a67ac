/**
 * Provision Engine — npm Global Installer
 */

import { Target } from "../types";
import { BaseInstaller, InstallCommand } from "./base-installer";

export class NpmGlobalInstaller extends BaseInstaller {
  readonly manager = "npm" as const;

  /** `npm list` exits 1 when the package is missing from the global tree */
  isPresent(target: Target): Promise<boolean> {
    return this.succeeds("npm", ["list", "-g", "--depth=0", target.id]);
  }

  installCommand(target: Target): InstallCommand {
    return { file: "npm", args: ["install", "-g", target.source ?? target.id] };
  }
}
