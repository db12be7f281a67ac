/**
 * Provision Catalog — Catalog Loader
 *
 * Manages the manifests stored on disk.
 * Provides loading, validation, searching, and an index of every package.
 *
 * Catalog structure:
 *   <catalog_dir>/
 *     manifests/
 *       <manifest-name>.yaml
 *     schema.json
 *
 * The loader builds an in-memory package index on first access. Manifests
 * that fail validation are left out of the index and reported through
 * validateAll() instead.
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { ManagerType } from "@provision/engine";
import { Manifest, normalizeManifest } from "./manifest";
import {
  assertManifest,
  ManifestError,
  validateManifest,
  ValidationResult,
} from "./validator";

/** One package of one group, flattened for search */
export interface CatalogEntry {
  manifest: string;
  group: string;
  groupName: string;
  manager: ManagerType;
  id: string;
  label: string | null;
  source: string | null;
}

const MANIFEST_EXTENSIONS = [".yaml", ".yml"];

export class Catalog {
  private catalogDir: string;
  private entries: CatalogEntry[] | null = null;

  constructor(catalogDir: string) {
    this.catalogDir = catalogDir;
  }

  /**
   * Get the manifests directory path.
   */
  get manifestsDir(): string {
    return path.join(this.catalogDir, "manifests");
  }

  /**
   * Names of all manifests (file names without extension), sorted.
   */
  listManifests(): string[] {
    if (!fs.existsSync(this.manifestsDir)) return [];
    return fs
      .readdirSync(this.manifestsDir)
      .filter((f) => MANIFEST_EXTENSIONS.includes(path.extname(f)))
      .map((f) => path.basename(f, path.extname(f)))
      .sort();
  }

  /**
   * Find a manifest file by catalog name or by path.
   * Returns null when neither exists.
   */
  resolve(nameOrPath: string): string | null {
    if (fs.existsSync(nameOrPath) && fs.statSync(nameOrPath).isFile()) {
      return path.resolve(nameOrPath);
    }
    for (const ext of MANIFEST_EXTENSIONS) {
      const candidate = path.join(this.manifestsDir, `${nameOrPath}${ext}`);
      if (fs.existsSync(candidate)) return candidate;
    }
    return null;
  }

  /**
   * Load, validate and normalize a manifest.
   *
   * @returns null if no such manifest exists
   * @throws ManifestError if the file is not valid YAML or fails validation
   */
  loadManifest(nameOrPath: string): Manifest | null {
    const filePath = this.resolve(nameOrPath);
    if (!filePath) return null;

    const raw = assertManifest(this.readYaml(filePath), filePath);
    return normalizeManifest(raw, filePath);
  }

  /**
   * Validate one manifest by name or path.
   */
  validateManifest(nameOrPath: string): ValidationResult | null {
    const filePath = this.resolve(nameOrPath);
    if (!filePath) return null;
    return this.validateFile(filePath);
  }

  /**
   * Validate every manifest in the catalog.
   */
  validateAll(): Map<string, ValidationResult> {
    const results = new Map<string, ValidationResult>();
    for (const name of this.listManifests()) {
      const filePath = this.resolve(name);
      if (filePath) results.set(name, this.validateFile(filePath));
    }
    return results;
  }

  /**
   * Package index across all valid manifests.
   * Caches the result — call refresh() to rebuild.
   */
  getEntries(): CatalogEntry[] {
    if (this.entries) return this.entries;
    this.entries = this.buildIndex();
    return this.entries;
  }

  /**
   * Force-rebuild the index.
   */
  refresh(): CatalogEntry[] {
    this.entries = null;
    return this.getEntries();
  }

  /**
   * Search packages by query. Matches against id, label, source, group id and group name.
   */
  search(query: string): CatalogEntry[] {
    const q = query.toLowerCase();
    return this.getEntries().filter((entry) => {
      const haystack = [
        entry.id,
        entry.label ?? "",
        entry.source ?? "",
        entry.group,
        entry.groupName,
      ]
        .join(" ")
        .toLowerCase();
      return haystack.includes(q);
    });
  }

  // ─── Private ────────────────────────────────────────────────

  private readYaml(filePath: string): unknown {
    const content = fs.readFileSync(filePath, "utf-8");
    try {
      const data: unknown = parseYaml(content);
      return data;
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ManifestError(`Cannot parse ${filePath}: ${message}`, [
        { path: "/", message, rule: "yaml:parse" },
      ]);
    }
  }

  private validateFile(filePath: string): ValidationResult {
    try {
      return validateManifest(this.readYaml(filePath));
    } catch (err: unknown) {
      if (err instanceof ManifestError) {
        return { valid: false, errors: err.errors };
      }
      throw err;
    }
  }

  /**
   * Walk every valid manifest and flatten its packages.
   */
  private buildIndex(): CatalogEntry[] {
    const entries: CatalogEntry[] = [];

    for (const name of this.listManifests()) {
      const filePath = this.resolve(name);
      if (!filePath || !this.validateFile(filePath).valid) continue;

      const manifest = this.loadManifest(filePath);
      if (!manifest) continue;

      for (const group of manifest.groups) {
        for (const pkg of group.packages) {
          entries.push({
            manifest: name,
            group: group.id,
            groupName: group.name,
            manager: group.manager,
            id: pkg.id,
            label: pkg.label ?? null,
            source: pkg.source ?? null,
          });
        }
      }
    }

    return entries;
  }
}
