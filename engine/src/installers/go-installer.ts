/**
 * Provision Engine — Go Installer
 *
 * Targets are module paths (`source`) installed with `go install`. There is
 * no Go equivalent of `brew list`, so presence means the binary is on PATH.
 * The binary name is the label if given, otherwise the last path element
 * of the module without its version suffix.
 */

import { Target } from "../types";
import { BaseInstaller, InstallCommand } from "./base-installer";

/**
 * Module path to install, with "@latest" added when no version is given
 * (go install refuses versionless paths outside a module).
 */
export function goModulePath(target: Target): string {
  const modulePath = target.source ?? target.id;
  return modulePath.includes("@") ? modulePath : `${modulePath}@latest`;
}

export function goBinaryName(target: Target): string {
  if (target.label) return target.label;
  const withoutVersion = (target.source ?? target.id).split("@")[0];
  const segments = withoutVersion.split("/").filter((s) => s.length > 0);
  // Major-version suffixes (…/v2) are not part of the binary name
  const last = segments[segments.length - 1] ?? withoutVersion;
  if (/^v\d+$/.test(last) && segments.length > 1) {
    return segments[segments.length - 2];
  }
  return last;
}

export class GoInstaller extends BaseInstaller {
  readonly manager = "go" as const;

  isPresent(target: Target): Promise<boolean> {
    return this.succeeds("which", [goBinaryName(target)]);
  }

  installCommand(target: Target): InstallCommand {
    return { file: "go", args: ["install", goModulePath(target)] };
  }
}
