/**
 * Provision Engine — Core Type Definitions
 *
 * The engine only knows about Targets, an Installer capability supplied by
 * the caller, and the policy that governs attempts. Everything
 * package-manager specific lives behind the Installer seam.
 */

import type { Logger } from "./utils/logger";

// ─── Targets ─────────────────────────────────────────────────────

export interface Target {
  /** Package identifier. Report entries are keyed by this value. */
  readonly id: string;
  /** Manager-specific hint, e.g. a Go module path */
  readonly source?: string;
  /** Display label */
  readonly label?: string;
}

/** An ordered list of targets submitted together. */
export type Batch = readonly Target[];

// ─── Installer (caller-supplied) ─────────────────────────────────

export interface InstallFailure {
  /** Human-readable reason, usually the tail of the manager's output */
  reason: string;
  /**
   * The artifact already exists under another name or path. The dispatcher
   * treats this as already present and stops.
   */
  alreadyExists?: boolean;
  /** Adapter's opinion on retrying. The default policy honours it. */
  retryable?: boolean;
  /** Exit code of the underlying process, when there was one */
  exitCode?: number;
}

export type InstallResult =
  | { success: true }
  | { success: false; failure: InstallFailure };

export interface Installer {
  /** Must be idempotent and free of side effects. */
  isPresent(target: Target): Promise<boolean>;
  install(target: Target): Promise<InstallResult>;
}

// ─── Attempt Policy ──────────────────────────────────────────────

/** Delay in milliseconds before the attempt after `attempt` (1-based). */
export type BackoffFn = (attempt: number) => number;

export interface AttemptPolicy {
  readonly maxAttempts: number;
  readonly backoff: BackoffFn;
  readonly isRetryable: (failure: InstallFailure) => boolean;
}

// ─── Outcomes ────────────────────────────────────────────────────

export type OutcomeKind = "already_present" | "installed" | "failed";

export interface AlreadyPresentOutcome {
  readonly kind: "already_present";
  readonly target: Target;
  /** "check" = presence check short-circuit, "already_exists" = reclassified install failure */
  readonly detectedBy: "check" | "already_exists";
  readonly attempts: number;
}

export interface InstalledOutcome {
  readonly kind: "installed";
  readonly target: Target;
  readonly attempts: number;
}

export interface FailedOutcome {
  readonly kind: "failed";
  readonly target: Target;
  readonly reason: string;
  readonly attempts: number;
  /** Stopped because the batch was cancelled, not because it gave up */
  readonly cancelled: boolean;
}

export type InstallOutcome =
  | AlreadyPresentOutcome
  | InstalledOutcome
  | FailedOutcome;

// ─── Report ──────────────────────────────────────────────────────

export interface OutcomeCounts {
  present: number;
  installed: number;
  /** Every failed outcome, cancelled ones included */
  failed: number;
  /** The subset of `failed` that stopped on cancellation */
  cancelled: number;
}

export interface FailureRecord {
  readonly target: Target;
  readonly reason: string;
  readonly attempts: number;
  readonly cancelled: boolean;
}

export interface ReportProgress {
  counts: OutcomeCounts;
  completed: number;
  total: number;
}

export interface BatchReport {
  readonly batchId: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  /** Cancellation was requested before the batch finished */
  readonly cancelled: boolean;
  /** Distinct target ids in batch submission order */
  readonly order: readonly string[];
  readonly outcomes: ReadonlyMap<string, InstallOutcome>;
  readonly counts: Readonly<OutcomeCounts>;
  /** Failed outcomes in batch submission order */
  readonly failures: readonly FailureRecord[];
}

// ─── Engine Events ───────────────────────────────────────────────

interface EventBase {
  timestamp: string;
  batchId: string;
}

export type EngineEvent =
  | (EventBase & { type: "batch_started"; total: number; concurrency: number })
  | (EventBase & { type: "target_started"; target: Target })
  | (EventBase & { type: "attempt_started"; target: Target; attempt: number; maxAttempts: number })
  | (EventBase & { type: "attempt_failed"; target: Target; attempt: number; failure: InstallFailure })
  | (EventBase & { type: "retry_scheduled"; target: Target; attempt: number; delayMs: number })
  | (EventBase & { type: "target_finished"; outcome: InstallOutcome; progress: ReportProgress })
  | (EventBase & { type: "batch_finished"; report: BatchReport });

export type EngineEventType = EngineEvent["type"];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

/** An event before the emitter stamps it with time and batch id */
export type EngineEventPayload = DistributiveOmit<
  EngineEvent,
  "timestamp" | "batchId"
>;

export type EngineEventHandler = (event: EngineEvent) => void;

// ─── Engine / Scheduler Options ──────────────────────────────────

export interface RunOptions {
  /** Defaults to the engine's (or the built-in) attempt policy */
  policy?: AttemptPolicy;
  /** Maximum in-flight targets; defaults to 1 (sequential) */
  concurrency?: number;
  /** Cooperative, batch-level cancellation */
  signal?: AbortSignal;
}

export interface EngineOptions {
  /** Enable debug logging to stderr */
  verbose?: boolean;
  /** Explicit log level; wins over `verbose` */
  logLevel?: "silent" | "debug" | "info" | "warn" | "error";
  /** Use this logger instead of creating one */
  logger?: Logger;
  /** Default policy for every run */
  policy?: AttemptPolicy;
  /** Default concurrency for every run */
  concurrency?: number;
}
