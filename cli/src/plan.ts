/**
 * Provision CLI — Install Planning
 *
 * Turns a manifest plus command-line filters into the batches the engine
 * runs: one batch per group, each with its own attempt policy and
 * concurrency. Nothing here touches a package manager.
 */

import {
  AttemptPolicy,
  BackoffFn,
  Batch,
  ManagerType,
  createAttemptPolicy,
  exponentialBackoff,
  fixedBackoff,
  linearBackoff,
  MAX_BACKOFF_MS,
} from "@provision/engine";
import type { BackoffSpec, Manifest, ManifestGroup } from "@provision/catalog";

/** Managers switched off by the long-standing --skip-* flags */
export const SKIP_FLAG_MANAGERS = {
  brew: ["brew", "cask"],
  python: ["pip"],
  node: ["npm"],
} as const satisfies Record<string, readonly ManagerType[]>;

export interface PlanOptions {
  /** Only these group ids; empty means all */
  groups?: string[];
  /** Managers to leave out */
  skip?: string[];
  skipBrew?: boolean;
  skipPython?: boolean;
  skipNode?: boolean;
  /** Override every group's concurrency */
  concurrency?: number;
  /** Override every group's attempts */
  attempts?: number;
  /** Override every group's backoff with a fixed delay */
  backoffMs?: number;
}

export interface PlannedBatch {
  group: ManifestGroup;
  targets: Batch;
  policy: AttemptPolicy;
  concurrency: number;
}

export class PlanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanError";
  }
}

export function toBackoff(spec: BackoffSpec): BackoffFn {
  switch (spec.strategy) {
    case "fixed":
      return fixedBackoff(spec.delay_ms);
    case "linear":
      return linearBackoff(spec.delay_ms);
    case "exponential":
      return exponentialBackoff(spec.delay_ms, spec.max_ms ?? MAX_BACKOFF_MS);
  }
}

/**
 * Every manager excluded by --skip and the --skip-* flags.
 */
export function skippedManagers(options: PlanOptions): Set<string> {
  const skipped = new Set<string>(options.skip ?? []);
  if (options.skipBrew) SKIP_FLAG_MANAGERS.brew.forEach((m) => skipped.add(m));
  if (options.skipPython) SKIP_FLAG_MANAGERS.python.forEach((m) => skipped.add(m));
  if (options.skipNode) SKIP_FLAG_MANAGERS.node.forEach((m) => skipped.add(m));
  return skipped;
}

/**
 * Build the batches to run, in manifest order.
 *
 * @throws PlanError if a requested group does not exist
 * @throws PolicyError if an attempts override is invalid
 */
export function buildPlan(manifest: Manifest, options: PlanOptions = {}): PlannedBatch[] {
  const wanted = options.groups ?? [];
  const known = new Set(manifest.groups.map((g) => g.id));
  const unknown = wanted.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new PlanError(
      `Unknown group(s) in ${manifest.id}: ${unknown.join(", ")}. ` +
        `Available: ${[...known].join(", ")}`,
    );
  }

  const skipped = skippedManagers(options);

  return manifest.groups
    .filter((group) => wanted.length === 0 || wanted.includes(group.id))
    .filter((group) => !skipped.has(group.manager))
    .map((group) => ({
      group,
      targets: group.packages.map((pkg) => ({ ...pkg })),
      policy: createAttemptPolicy({
        maxAttempts: options.attempts ?? group.attempts,
        backoff:
          options.backoffMs !== undefined
            ? fixedBackoff(options.backoffMs)
            : toBackoff(group.backoff),
      }),
      concurrency: options.concurrency ?? group.concurrency,
    }));
}

/**
 * Total number of packages across a plan.
 */
export function countTargets(plan: readonly PlannedBatch[]): number {
  return plan.reduce((sum, batch) => sum + batch.targets.length, 0);
}
