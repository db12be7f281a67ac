/**
 * Provision Catalog — Manifest Types
 *
 * A manifest is the on-disk YAML description of what to install: named
 * groups of packages, one package manager per group, with optional retry
 * and concurrency settings per group or manifest-wide.
 *
 * Raw* types mirror the YAML (snake_case, shorthand strings allowed).
 * normalizeManifest() turns a validated raw manifest into the shape the
 * CLI plans from, with every group setting resolved.
 */

import {
  DEFAULT_BACKOFF_MS,
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_ATTEMPTS,
  ManagerType,
} from "@provision/engine";

export type BackoffStrategy = "fixed" | "linear" | "exponential";

export interface BackoffSpec {
  strategy: BackoffStrategy;
  delay_ms: number;
  /** Cap for exponential backoff */
  max_ms?: number;
}

export interface GroupSettings {
  attempts?: number;
  backoff?: BackoffSpec;
  concurrency?: number;
}

export interface PackageSpec {
  id: string;
  /** Install argument when it differs from the id (npm name, Go module path) */
  source?: string;
  label?: string;
}

export interface RawGroup extends GroupSettings {
  id: string;
  name: string;
  manager: ManagerType;
  /** Bare strings are shorthand for { id } */
  packages: (string | PackageSpec)[];
}

export interface RawManifest {
  id: string;
  name: string;
  description?: string;
  defaults?: GroupSettings;
  groups: RawGroup[];
}

// ─── Normalized ─────────────────────────────────────────────────

export interface ManifestGroup {
  id: string;
  name: string;
  manager: ManagerType;
  packages: PackageSpec[];
  attempts: number;
  backoff: BackoffSpec;
  concurrency: number;
}

export interface Manifest {
  id: string;
  name: string;
  description: string;
  groups: ManifestGroup[];
  /** Where the manifest was read from; null when built in memory */
  filePath: string | null;
}

export const BUILTIN_SETTINGS: Required<GroupSettings> = {
  attempts: DEFAULT_MAX_ATTEMPTS,
  backoff: { strategy: "fixed", delay_ms: DEFAULT_BACKOFF_MS },
  concurrency: DEFAULT_CONCURRENCY,
};

export function expandPackage(entry: string | PackageSpec): PackageSpec {
  return typeof entry === "string" ? { id: entry } : { ...entry };
}

/**
 * Resolve shorthand packages and merge group settings over the manifest
 * defaults, then the built-in ones. Expects a manifest that already
 * passed validation.
 */
export function normalizeManifest(
  raw: RawManifest,
  filePath: string | null = null,
): Manifest {
  const defaults = { ...BUILTIN_SETTINGS, ...raw.defaults };

  return {
    id: raw.id,
    name: raw.name,
    description: raw.description ?? "",
    filePath,
    groups: raw.groups.map((group) => ({
      id: group.id,
      name: group.name,
      manager: group.manager,
      packages: group.packages.map(expandPackage),
      attempts: group.attempts ?? defaults.attempts,
      backoff: group.backoff ?? defaults.backoff,
      concurrency: group.concurrency ?? defaults.concurrency,
    })),
  };
}
