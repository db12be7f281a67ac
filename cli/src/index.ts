#!/usr/bin/env tsx

/**
 * Provision CLI — Entry Point
 *
 * Sets up a machine from a manifest of package groups: Homebrew formulae
 * and casks, global npm packages, Python packages, Rust crates, Go modules
 * and VS Code extensions. Re-running is safe; installed packages are
 * skipped.
 *
 * Commands:
 *   provision install [groups...]  Install missing packages
 *   provision status [groups...]   Show what is installed
 *   provision list                 Show the groups of a manifest
 *   provision search <query>       Find a package across manifests
 *   provision validate [manifest]  Check manifests against the schema
 */

import { Command } from "commander";
import { registerInstallCommand } from "./commands/install";
import { registerListCommand } from "./commands/list";
import { registerStatusCommand } from "./commands/status";
import { registerSearchCommand } from "./commands/search";
import { registerValidateCommand } from "./commands/validate";
import { setDebugMode } from "./output";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("provision")
    .description("Idempotent, retrying, parallel package installation for a fresh machine")
    .version("0.1.0")
    .option("--debug", "Show debug output and engine logs", false)
    .hook("preAction", (thisCommand) => {
      setDebugMode(thisCommand.opts<{ debug: boolean }>().debug);
    });

  registerInstallCommand(program);
  registerStatusCommand(program);
  registerListCommand(program);
  registerSearchCommand(program);
  registerValidateCommand(program);

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
}
