/**
 * Provision CLI — Installer Setup
 *
 * Picks the executables the adapters run. pip groups install into a shared
 * virtualenv unless PROVISION_PIP names a pip to use instead.
 */

import {
  CreateInstallerOptions,
  Installer,
  ManagerType,
  getInstaller,
  virtualenvPip,
} from "@provision/engine";
import type { CliConfig } from "./config";
import type { PlannedBatch } from "./plan";

export type InstallerFactory = (manager: ManagerType) => Installer;

export function installerOptions(config: CliConfig): CreateInstallerOptions {
  return {
    pipCommand: config.pipCommand ?? virtualenvPip(config.pythonVenv),
    codeCommand: config.codeCommand,
  };
}

export function installerFactory(options: CreateInstallerOptions): InstallerFactory {
  return (manager) => getInstaller(manager, options);
}

/**
 * True when the plan has a pip group that should run inside the virtualenv.
 */
export function needsVirtualenv(plan: readonly PlannedBatch[], config: CliConfig): boolean {
  return config.pipCommand === undefined && plan.some((b) => b.group.manager === "pip");
}
