/**
 * Provision CLI — Status Command
 *
 * Shows which packages of a manifest are already installed. Runs only the
 * presence checks; nothing is installed.
 *
 * Usage:
 *   provision status                 Every group of the default manifest
 *   provision status python --all    One group, including installed packages
 */

import { Command } from "commander";
import { ProvisionEngine, describeTarget } from "@provision/engine";
import { loadConfigOrExit } from "../config";
import { loadManifestOrExit } from "../catalog";
import { installerFactory, installerOptions } from "../installers";
import { buildPlan, PlanError, PlannedBatch } from "../plan";
import { addSelectionOptions, SelectionOptions, toPlanOptions } from "../options";
import {
  colors,
  createSpinner,
  isDebugMode,
  printError,
  printInfo,
  printSuccess,
  printTable,
} from "../output";

interface StatusOptions extends SelectionOptions {
  all: boolean;
}

export function registerStatusCommand(program: Command): void {
  addSelectionOptions(
    program
      .command("status [groups...]")
      .description("Show which packages of a manifest are installed"),
  )
    .option("--all", "Also list packages that are installed", false)
    .action(async (groups: string[], opts: StatusOptions) => {
      const config = loadConfigOrExit();
      const manifest = loadManifestOrExit(opts.manifest);

      let plan: PlannedBatch[];
      try {
        plan = buildPlan(manifest, toPlanOptions(groups, opts, config));
      } catch (err: unknown) {
        if (!(err instanceof PlanError)) throw err;
        printError(err.message);
        process.exit(1);
      }

      const engine = new ProvisionEngine({
        logLevel: isDebugMode() ? "debug" : config.logLevel,
      });
      const installerFor = installerFactory(installerOptions(config));
      const spinner = createSpinner("Checking installed packages...");
      const rows: string[][] = [];
      let present = 0;
      let total = 0;

      spinner.start();
      try {
        for (const batch of plan) {
          spinner.text = `Checking ${batch.group.name}...`;
          const entries = await engine.check(
            batch.targets,
            installerFor(batch.group.manager),
            batch.concurrency,
          );

          for (const entry of entries) {
            total++;
            if (entry.present) present++;
            if (entry.present && !opts.all) continue;

            const status = entry.error
              ? colors.warn(`unknown (${entry.error})`)
              : entry.present
                ? colors.success("installed")
                : colors.error("missing");
            rows.push([describeTarget(entry.target), batch.group.id, status]);
          }
        }
      } finally {
        spinner.stop();
        engine.close();
      }

      if (rows.length > 0) {
        printTable({ head: ["Package", "Group", "Status"], rows });
      }

      if (present === total) {
        printSuccess(`All ${total} package(s) are installed.`);
      } else {
        printInfo(`${present} of ${total} package(s) installed, ${total - present} missing.`);
      }
    });
}
