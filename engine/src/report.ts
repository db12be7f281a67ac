/**
 * Provision Engine — Report Aggregation
 *
 * The ReportBuilder is the only mutable structure shared by scheduler
 * workers. Workers hand it finished outcomes and never read each other's
 * entries. Counts are kept incrementally so a long batch can show
 * progress; summarizeOutcomes() re-derives the same numbers from a
 * finished report.
 */

import {
  Batch,
  BatchReport,
  FailureRecord,
  InstallOutcome,
  OutcomeCounts,
  ReportProgress,
  Target,
} from "./types";
import { ReportError } from "./errors";

export function emptyCounts(): OutcomeCounts {
  return { present: 0, installed: 0, failed: 0, cancelled: 0 };
}

/**
 * Add one outcome to a running tally (mutates `counts`).
 */
export function tallyOutcome(
  counts: OutcomeCounts,
  outcome: InstallOutcome,
): void {
  switch (outcome.kind) {
    case "already_present":
      counts.present++;
      break;
    case "installed":
      counts.installed++;
      break;
    case "failed":
      counts.failed++;
      if (outcome.cancelled) counts.cancelled++;
      break;
  }
}

export interface OutcomeSummary {
  counts: OutcomeCounts;
  failures: FailureRecord[];
}

/**
 * Pure reduction over a set of outcomes. Failures are listed in `order`,
 * never in completion order; ids without an outcome are ignored.
 */
export function summarizeOutcomes(
  order: readonly string[],
  outcomes: ReadonlyMap<string, InstallOutcome>,
): OutcomeSummary {
  const counts = emptyCounts();
  const failures: FailureRecord[] = [];

  for (const id of order) {
    const outcome = outcomes.get(id);
    if (!outcome) continue;
    tallyOutcome(counts, outcome);
    if (outcome.kind === "failed") {
      failures.push({
        target: outcome.target,
        reason: outcome.reason,
        attempts: outcome.attempts,
        cancelled: outcome.cancelled,
      });
    }
  }

  return { counts, failures };
}

export interface ReportMeta {
  batchId: string;
  startedAt: string;
  finishedAt: string;
  cancelled: boolean;
}

export class ReportBuilder {
  private readonly order: string[] = [];
  private readonly known = new Set<string>();
  private readonly outcomes = new Map<string, InstallOutcome>();
  private readonly counts = emptyCounts();
  private finalized = false;

  /**
   * @param batch - Targets in submission order. Repeated ids keep their
   *   first position.
   */
  constructor(batch: Batch) {
    for (const target of batch) {
      if (this.known.has(target.id)) continue;
      this.known.add(target.id);
      this.order.push(target.id);
    }
  }

  get total(): number {
    return this.order.length;
  }

  get completed(): number {
    return this.outcomes.size;
  }

  has(targetId: string): boolean {
    return this.outcomes.has(targetId);
  }

  /**
   * Store the outcome for one target. Each target gets exactly one.
   *
   * @throws ReportError for unknown targets, second outcomes, or after finalize()
   */
  record(outcome: InstallOutcome): void {
    const id = outcome.target.id;
    if (this.finalized) {
      throw new ReportError(
        "REPORT_FINALIZED",
        `Report already finalized; cannot record "${id}"`,
      );
    }
    if (!this.known.has(id)) {
      throw new ReportError("UNKNOWN_TARGET", `"${id}" is not in this batch`);
    }
    if (this.outcomes.has(id)) {
      throw new ReportError(
        "DUPLICATE_OUTCOME",
        `"${id}" already has an outcome`,
      );
    }

    this.outcomes.set(id, outcome);
    tallyOutcome(this.counts, outcome);
  }

  /**
   * Snapshot of the counts so far.
   */
  progress(): ReportProgress {
    return {
      counts: { ...this.counts },
      completed: this.completed,
      total: this.total,
    };
  }

  /**
   * Targets that have not produced an outcome yet, in batch order.
   */
  pending(): string[] {
    return this.order.filter((id) => !this.outcomes.has(id));
  }

  /**
   * Seal the report. No further outcomes are accepted.
   *
   * @throws ReportError if any target is still without an outcome
   */
  finalize(meta: ReportMeta): BatchReport {
    const missing = this.pending();
    if (missing.length > 0) {
      throw new ReportError(
        "INCOMPLETE_REPORT",
        `No outcome for: ${missing.join(", ")}`,
      );
    }
    this.finalized = true;

    const { failures } = summarizeOutcomes(this.order, this.outcomes);

    return Object.freeze({
      ...meta,
      order: Object.freeze([...this.order]),
      outcomes: new Map(this.outcomes),
      counts: Object.freeze({ ...this.counts }),
      failures: Object.freeze(failures),
    });
  }
}

/**
 * Look up one target's outcome by id.
 */
export function getOutcome(
  report: BatchReport,
  targetId: string,
): InstallOutcome | undefined {
  return report.outcomes.get(targetId);
}

export interface MergedReport {
  total: number;
  counts: OutcomeCounts;
  failures: FailureRecord[];
  cancelled: boolean;
}

/**
 * Combine several batch reports, keeping each report's failure order and
 * the order of the reports themselves.
 */
export function mergeReports(reports: readonly BatchReport[]): MergedReport {
  const counts = emptyCounts();
  const failures: FailureRecord[] = [];
  let total = 0;
  let cancelled = false;

  for (const report of reports) {
    total += report.order.length;
    counts.present += report.counts.present;
    counts.installed += report.counts.installed;
    counts.failed += report.counts.failed;
    counts.cancelled += report.counts.cancelled;
    failures.push(...report.failures);
    cancelled = cancelled || report.cancelled;
  }

  return { total, counts, failures, cancelled };
}

/**
 * Display name for a target.
 */
export function describeTarget(target: Target): string {
  return target.label ?? target.id;
}
