/**
 * Provision Catalog — Manifest Validator
 *
 * Validates manifests against the JSON Schema defined in schema.json.
 * Uses AJV for JSON Schema validation.
 *
 * Two levels of validation:
 * 1. Schema validation (structure, types, enums) via AJV
 * 2. Semantic validation (cross-field rules) via custom checks, run only
 *    once the structure is known to be sound
 */

import Ajv, { Schema, ValidateFunction } from 'ajv';
import * as fs from 'fs';
import * as path from 'path';
import { GroupSettings, RawManifest } from './manifest';

/** Highest concurrency a single group may ask for */
export const MAX_GROUP_CONCURRENCY = 16;

/** A validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  rule: string;
}

export class ManifestError extends Error {
  readonly errors: ValidationError[];

  constructor(message: string, errors: ValidationError[] = []) {
    super(message);
    this.name = 'ManifestError';
    this.errors = errors;
  }
}

// Load the JSON Schema
const SCHEMA_PATH = path.join(__dirname, '..', 'schema.json');

let _validate: ValidateFunction<RawManifest> | null = null;

function getValidator(): ValidateFunction<RawManifest> {
  if (_validate) return _validate;

  const schemaContent = fs.readFileSync(SCHEMA_PATH, 'utf-8');
  const schema: Schema = JSON.parse(schemaContent);

  const ajv = new Ajv({ allErrors: true, strict: false });

  _validate = ajv.compile<RawManifest>(schema);
  return _validate;
}

/**
 * Validate a parsed manifest against the JSON Schema + semantic rules.
 */
export function validateManifest(data: unknown): ValidationResult {
  const validate = getValidator();

  if (!validate(data)) {
    return {
      valid: false,
      errors: (validate.errors ?? []).map((err) => ({
        path: err.instancePath || '/',
        message: err.message || 'Unknown validation error',
        rule: `schema:${err.keyword}`,
      })),
    };
  }

  const errors = validateSemanticRules(data);
  return { valid: errors.length === 0, errors };
}

/**
 * Narrow parsed YAML to a RawManifest, or throw with every problem found.
 */
export function assertManifest(data: unknown, source: string): RawManifest {
  const result = validateManifest(data);
  if (result.valid && getValidator()(data)) return data;
  throw new ManifestError(
    `Manifest ${source} is invalid (${result.errors.length} error(s))`,
    result.errors,
  );
}

// ─── Semantic Rules ─────────────────────────────────────────────

function validateSettings(settings: GroupSettings, at: string): ValidationError[] {
  const errors: ValidationError[] = [];

  if (settings.backoff?.max_ms !== undefined && settings.backoff.strategy !== 'exponential') {
    errors.push({
      path: `${at}/backoff/max_ms`,
      message: `max_ms only applies to exponential backoff, not "${settings.backoff.strategy}"`,
      rule: 'semantic:max-ms-requires-exponential',
    });
  }

  if (settings.concurrency !== undefined && settings.concurrency > MAX_GROUP_CONCURRENCY) {
    errors.push({
      path: `${at}/concurrency`,
      message: `concurrency ${settings.concurrency} exceeds the limit of ${MAX_GROUP_CONCURRENCY}`,
      rule: 'semantic:concurrency-limit',
    });
  }

  return errors;
}

/**
 * Rules JSON Schema cannot express.
 */
function validateSemanticRules(manifest: RawManifest): ValidationError[] {
  const errors: ValidationError[] = [];

  if (manifest.defaults) {
    errors.push(...validateSettings(manifest.defaults, '/defaults'));
  }

  const groupIds = new Set<string>();

  manifest.groups.forEach((group, g) => {
    const at = `/groups/${g}`;

    if (groupIds.has(group.id)) {
      errors.push({
        path: `${at}/id`,
        message: `Duplicate group id "${group.id}"`,
        rule: 'semantic:unique-group-id',
      });
    }
    groupIds.add(group.id);

    errors.push(...validateSettings(group, at));

    const packageIds = new Set<string>();
    group.packages.forEach((entry, p) => {
      const id = typeof entry === 'string' ? entry : entry.id;
      if (packageIds.has(id)) {
        errors.push({
          path: `${at}/packages/${p}`,
          message: `Package "${id}" is listed twice in group "${group.id}"`,
          rule: 'semantic:unique-package-id',
        });
      }
      packageIds.add(id);

      // go install needs a full module path; the id is only the display key
      if (group.manager === 'go' && (typeof entry === 'string' || !entry.source)) {
        errors.push({
          path: `${at}/packages/${p}`,
          message: `Go package "${id}" needs a "source" module path`,
          rule: 'semantic:go-requires-source',
        });
      }
    });
  });

  return errors;
}
