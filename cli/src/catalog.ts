/**
 * Provision CLI — Catalog Bridge
 *
 * The CLI reads manifests from the catalog bundled with the
 * @provision/catalog package. A --manifest value may name a bundled
 * manifest or point at any YAML file on disk.
 */

import {
  BUNDLED_CATALOG_DIR,
  Catalog,
  DEFAULT_MANIFEST,
  Manifest,
  ManifestError,
} from "@provision/catalog";
import { printError, printInfo, colors } from "./output";

let _catalog: Catalog | null = null;

export function getCatalog(): Catalog {
  if (!_catalog) _catalog = new Catalog(BUNDLED_CATALOG_DIR);
  return _catalog;
}

/**
 * Load a manifest, or print why it could not be loaded and exit 1.
 */
export function loadManifestOrExit(nameOrPath: string = DEFAULT_MANIFEST): Manifest {
  let manifest: Manifest | null;
  try {
    manifest = getCatalog().loadManifest(nameOrPath);
  } catch (err: unknown) {
    if (!(err instanceof ManifestError)) throw err;
    printError(err.message);
    for (const e of err.errors) {
      console.error(`    - [${e.rule}] ${e.path}: ${e.message}`);
    }
    process.exit(1);
  }

  if (!manifest) {
    printError(`Manifest "${nameOrPath}" not found.`);
    const available = getCatalog().listManifests();
    if (available.length > 0) {
      printInfo(`Bundled manifests: ${available.map((m) => colors.bold(m)).join(", ")}`);
    }
    process.exit(1);
  }

  return manifest;
}
