/**
 * Provision CLI — List Command
 *
 * Shows the groups of a manifest and how each would be installed.
 *
 * Usage:
 *   provision list                   Groups of the default manifest
 *   provision list -m ./work.yaml    Groups of another manifest
 *   provision list --manifests       Bundled manifests
 */

import { Command } from "commander";
import { DEFAULT_MANIFEST } from "@provision/catalog";
import { getCatalog, loadManifestOrExit } from "../catalog";
import { printInfo, printTable, colors, formatDuration } from "../output";

export function registerListCommand(program: Command): void {
  program
    .command("list")
    .alias("ls")
    .description("List the package groups of a manifest")
    .option("-m, --manifest <name|path>", "Bundled manifest name or path to a YAML file", DEFAULT_MANIFEST)
    .option("--manifests", "List bundled manifests instead", false)
    .action((opts: { manifest: string; manifests: boolean }) => {
      if (opts.manifests) {
        const names = getCatalog().listManifests();
        if (names.length === 0) {
          printInfo("No bundled manifests.");
          return;
        }
        for (const name of names) {
          console.log(`  ${colors.bold(name)}${name === DEFAULT_MANIFEST ? colors.dim(" (default)") : ""}`);
        }
        return;
      }

      const manifest = loadManifestOrExit(opts.manifest);

      printInfo(`${colors.bold(manifest.name)}${manifest.description ? colors.dim(`: ${manifest.description}`) : ""}\n`);

      printTable({
        head: ["Group", "Manager", "Packages", "Concurrency", "Attempts", "Backoff"],
        rows: manifest.groups.map((group) => [
          colors.bold(group.id),
          colors.manager(group.manager),
          String(group.packages.length),
          String(group.concurrency),
          String(group.attempts),
          `${group.backoff.strategy} ${formatDuration(group.backoff.delay_ms)}`,
        ]),
      });

      const total = manifest.groups.reduce((sum, g) => sum + g.packages.length, 0);
      printInfo(`${total} package(s) in ${manifest.groups.length} group(s).`);
    });
}
