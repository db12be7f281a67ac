/**
 * Provision Engine — Configuration Errors
 *
 * These are only thrown while a run is being set up (bad policy, bad
 * concurrency, misuse of the report builder). Install failures are never
 * thrown; they become Failed outcomes.
 */

export type ProvisionErrorCode =
  | "INVALID_POLICY"
  | "INVALID_CONCURRENCY"
  | "UNKNOWN_TARGET"
  | "DUPLICATE_OUTCOME"
  | "REPORT_FINALIZED"
  | "INCOMPLETE_REPORT"
  | "UNKNOWN_MANAGER"
  | "VIRTUALENV_FAILED";

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode;

  constructor(code: ProvisionErrorCode, message: string) {
    super(message);
    this.name = "ProvisionError";
    this.code = code;
  }
}

export class PolicyError extends ProvisionError {
  constructor(message: string) {
    super("INVALID_POLICY", message);
    this.name = "PolicyError";
  }
}

export class SchedulerError extends ProvisionError {
  constructor(message: string) {
    super("INVALID_CONCURRENCY", message);
    this.name = "SchedulerError";
  }
}

export class ReportError extends ProvisionError {
  constructor(
    code:
      | "UNKNOWN_TARGET"
      | "DUPLICATE_OUTCOME"
      | "REPORT_FINALIZED"
      | "INCOMPLETE_REPORT",
    message: string,
  ) {
    super(code, message);
    this.name = "ReportError";
  }
}

/**
 * Message of anything thrown, for turning into a failure reason.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
