/**
 * Provision Catalog — Public API
 *
 * Main entry point for the catalog package.
 * Exports the Catalog class, validator, and manifest types.
 */

import * as path from 'path';

export { Catalog } from './loader';
export type { CatalogEntry } from './loader';
export {
  validateManifest,
  assertManifest,
  ManifestError,
  MAX_GROUP_CONCURRENCY,
} from './validator';
export type { ValidationResult, ValidationError } from './validator';
export { normalizeManifest, expandPackage, BUILTIN_SETTINGS } from './manifest';
export type {
  BackoffSpec,
  BackoffStrategy,
  GroupSettings,
  Manifest,
  ManifestGroup,
  PackageSpec,
  RawGroup,
  RawManifest,
} from './manifest';

/** Directory holding the bundled manifests and schema.json */
export const BUNDLED_CATALOG_DIR = path.join(__dirname, '..');

/** Manifest used when none is named */
export const DEFAULT_MANIFEST = 'macos-workstation';
