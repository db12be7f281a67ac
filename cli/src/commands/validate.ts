/**
 * Provision CLI — Validate Command
 *
 * Checks manifests against the schema and the semantic rules.
 *
 * Usage:
 *   provision validate               Every bundled manifest
 *   provision validate ./work.yaml   One manifest by name or path
 *
 * Exits 1 if any manifest is invalid.
 */

import { Command } from "commander";
import type { ValidationResult } from "@provision/catalog";
import { getCatalog } from "../catalog";
import { printError, printSuccess, colors } from "../output";

function printResult(name: string, result: ValidationResult): void {
  if (result.valid) {
    printSuccess(name);
    return;
  }
  printError(name);
  for (const error of result.errors) {
    console.log(`    - ${colors.dim(`[${error.rule}]`)} ${error.path}: ${error.message}`);
  }
}

export function registerValidateCommand(program: Command): void {
  program
    .command("validate [manifest]")
    .description("Validate manifests against the schema")
    .action((manifest: string | undefined) => {
      const catalog = getCatalog();
      let results: Map<string, ValidationResult>;

      if (manifest) {
        const result = catalog.validateManifest(manifest);
        if (!result) {
          printError(`Manifest "${manifest}" not found.`);
          process.exit(1);
        }
        results = new Map([[manifest, result]]);
      } else {
        results = catalog.validateAll();
      }

      for (const [name, result] of results) {
        printResult(name, result);
      }

      const invalid = [...results.values()].filter((r) => !r.valid).length;
      console.log();
      console.log(`${results.size} manifest(s) checked, ${invalid} invalid.`);
      if (invalid > 0) process.exitCode = 1;
    });
}
