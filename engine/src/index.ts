/**
 * Provision Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here — never from internal modules.
 */

// Main engine class
export { ProvisionEngine } from "./engine";
export type { PresenceEntry } from "./engine";

// All types
export type {
  Target,
  Batch,
  Installer,
  InstallResult,
  InstallFailure,
  AttemptPolicy,
  BackoffFn,
  OutcomeKind,
  InstallOutcome,
  AlreadyPresentOutcome,
  InstalledOutcome,
  FailedOutcome,
  OutcomeCounts,
  FailureRecord,
  ReportProgress,
  BatchReport,
  EngineEvent,
  EngineEventType,
  EngineEventPayload,
  EngineEventHandler,
  EngineOptions,
  RunOptions,
} from "./types";

// Building blocks (usable without the engine class)
export { dispatchTarget, CANCELLED_REASON } from "./dispatcher";
export type { DispatchContext } from "./dispatcher";
export {
  runBatch,
  validateConcurrency,
  DEFAULT_CONCURRENCY,
} from "./scheduler";
export type { ScheduleOptions } from "./scheduler";
export {
  ReportBuilder,
  summarizeOutcomes,
  mergeReports,
  getOutcome,
  describeTarget,
  emptyCounts,
} from "./report";
export type { MergedReport, OutcomeSummary, ReportMeta } from "./report";
export {
  createAttemptPolicy,
  defaultIsRetryable,
  fixedBackoff,
  linearBackoff,
  exponentialBackoff,
  DEFAULT_POLICY,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BACKOFF_MS,
  MAX_BACKOFF_MS,
  BACKOFF_PRESETS,
} from "./policy";
export {
  ProvisionError,
  PolicyError,
  SchedulerError,
  ReportError,
} from "./errors";
export type { ProvisionErrorCode } from "./errors";

// Package-manager adapters
export {
  getInstaller,
  getSupportedManagers,
  isManagerType,
  BaseInstaller,
} from "./installers";
export type {
  CreateInstallerOptions,
  InstallCommand,
  InstallerOptions,
  ManagerType,
} from "./installers";
export {
  ensureVirtualenv,
  virtualenvPip,
} from "./installers/pip-installer";
export type { Virtualenv, VirtualenvOptions } from "./installers/pip-installer";
export { classifyFailure, FAILURE_PATTERNS } from "./installers/classify";
export type { FailureCategory } from "./installers/classify";
export { execRunner, EXIT_COMMAND_NOT_FOUND } from "./installers/command-runner";
export type {
  CommandRunner,
  CommandResult,
  CommandOptions,
} from "./installers/command-runner";

// Utilities
export { createLogger } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";
