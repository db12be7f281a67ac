/**
 * Provision Engine — Installer Registry
 *
 * Maps package-manager names to their adapter implementations.
 * This is the only place where adapters are registered.
 */

import { ProvisionError } from "../errors";
import { BaseInstaller, InstallerOptions, ManagerType } from "./base-installer";
import { BrewCaskInstaller, BrewFormulaInstaller } from "./brew-installer";
import { CargoInstaller } from "./cargo-installer";
import { GoInstaller } from "./go-installer";
import { NpmGlobalInstaller } from "./npm-installer";
import { PipInstaller } from "./pip-installer";
import { VscodeExtensionInstaller } from "./vscode-installer";

export { BaseInstaller } from "./base-installer";
export type { InstallCommand, InstallerOptions, ManagerType } from "./base-installer";

export interface CreateInstallerOptions extends InstallerOptions {
  pipCommand?: string;
  codeCommand?: string;
}

type InstallerFactory = (options: CreateInstallerOptions) => BaseInstaller;

const factories: Map<ManagerType, InstallerFactory> = new Map();

// Register all built-in adapters
factories.set("brew", (o) => new BrewFormulaInstaller(o));
factories.set("cask", (o) => new BrewCaskInstaller(o));
factories.set("npm", (o) => new NpmGlobalInstaller(o));
factories.set("pip", (o) => new PipInstaller(o));
factories.set("cargo", (o) => new CargoInstaller(o));
factories.set("go", (o) => new GoInstaller(o));
factories.set("vscode", (o) => new VscodeExtensionInstaller(o));

export function isManagerType(value: string): value is ManagerType {
  return getSupportedManagers().some((manager) => manager === value);
}

/**
 * Create the adapter for a package manager.
 *
 * @throws ProvisionError if no adapter is registered under that name
 */
export function getInstaller(
  manager: string,
  options: CreateInstallerOptions = {},
): BaseInstaller {
  const factory = isManagerType(manager) ? factories.get(manager) : undefined;
  if (!factory) {
    throw new ProvisionError(
      "UNKNOWN_MANAGER",
      `No installer registered for package manager "${manager}". ` +
        `Supported managers: ${getSupportedManagers().join(", ")}`,
    );
  }
  return factory(options);
}

/**
 * Get all supported package managers.
 */
export function getSupportedManagers(): ManagerType[] {
  return Array.from(factories.keys());
}
