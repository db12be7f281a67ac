/**
 * Provision Engine — Dispatcher
 *
 * Runs the attempt policy over a single target and produces exactly one
 * outcome:
 *
 *   isPresent? ── yes ──────────────────────────────► already_present
 *       │ no
 *       ▼
 *   install (attempt n) ── ok ─────────────────────► installed
 *       │ failed
 *       ├─ alreadyExists ──────────────────────────► already_present
 *       ├─ not retryable / n == maxAttempts ───────► failed
 *       ├─ cancelled ──────────────────────────────► failed (cancelled)
 *       └─ sleep backoff(n), n + 1, loop
 *
 * Attempts for one target are strictly sequential. An install call that is
 * already running is allowed to finish; cancellation is observed before
 * the presence check, between attempts, and during the backoff sleep.
 *
 * Nothing thrown by the installer or the policy escapes: it all ends up in
 * the outcome.
 */

import {
  AttemptPolicy,
  EngineEventPayload,
  FailedOutcome,
  InstallFailure,
  InstallOutcome,
  Installer,
  Target,
} from "./types";
import { Logger } from "./utils/logger";
import { sleep } from "./utils/sleep";
import { resolveDelay } from "./policy";
import { errorMessage } from "./errors";

export const CANCELLED_REASON = "cancelled";

export interface DispatchContext {
  logger: Logger;
  signal?: AbortSignal;
  emit?: (event: EngineEventPayload) => void;
}

// ─── Outcome constructors ───────────────────────────────────────

function alreadyPresent(
  target: Target,
  detectedBy: "check" | "already_exists",
  attempts: number,
): InstallOutcome {
  return Object.freeze({ kind: "already_present", target, detectedBy, attempts });
}

function installed(target: Target, attempts: number): InstallOutcome {
  return Object.freeze({ kind: "installed", target, attempts });
}

export function failedOutcome(
  target: Target,
  reason: string,
  attempts: number,
  cancelled = false,
): FailedOutcome {
  return Object.freeze({
    kind: "failed",
    target,
    reason,
    attempts,
    cancelled,
  });
}

export function cancelledOutcome(target: Target, attempts: number): FailedOutcome {
  return failedOutcome(target, CANCELLED_REASON, attempts, true);
}

// ─── Helpers ────────────────────────────────────────────────────

/**
 * One install call. Returns null on success, the failure otherwise.
 * A throwing installer counts as an ordinary failure.
 */
async function attemptInstall(
  installer: Installer,
  target: Target,
): Promise<InstallFailure | null> {
  try {
    const result = await installer.install(target);
    return result.success ? null : result.failure;
  } catch (err: unknown) {
    return { reason: errorMessage(err) };
  }
}

// ─── Dispatch ───────────────────────────────────────────────────

export async function dispatchTarget(
  target: Target,
  installer: Installer,
  policy: AttemptPolicy,
  context: DispatchContext,
): Promise<InstallOutcome> {
  const { signal } = context;
  const emit = context.emit ?? (() => undefined);
  const log = context.logger.child({ target: target.id });

  if (signal?.aborted) {
    log.debug("Batch cancelled before start");
    return cancelledOutcome(target, 0);
  }

  emit({ type: "target_started", target });

  let present: boolean;
  try {
    present = await installer.isPresent(target);
  } catch (err: unknown) {
    const reason = `presence check failed: ${errorMessage(err)}`;
    log.warn({ error: reason }, "Presence check failed");
    return failedOutcome(target, reason, 0);
  }

  if (present) {
    log.info("Already installed, skipping");
    return alreadyPresent(target, "check", 0);
  }

  for (let attempt = 1; ; attempt++) {
    emit({
      type: "attempt_started",
      target,
      attempt,
      maxAttempts: policy.maxAttempts,
    });
    log.debug({ attempt, maxAttempts: policy.maxAttempts }, "Installing");

    const failure = await attemptInstall(installer, target);
    if (!failure) {
      log.info({ attempts: attempt }, "Installed");
      return installed(target, attempt);
    }

    emit({ type: "attempt_failed", target, attempt, failure });

    if (failure.alreadyExists) {
      log.info(
        { attempt, reason: failure.reason },
        "Already exists under another name, skipping",
      );
      return alreadyPresent(target, "already_exists", attempt);
    }

    log.warn(
      { attempt, maxAttempts: policy.maxAttempts, reason: failure.reason },
      "Install attempt failed",
    );

    let retry: boolean;
    let delayMs = 0;
    try {
      retry = attempt < policy.maxAttempts && policy.isRetryable(failure);
      if (retry) delayMs = resolveDelay(policy.backoff, attempt);
    } catch (err: unknown) {
      log.error({ error: errorMessage(err) }, "Attempt policy threw");
      return failedOutcome(
        target,
        `${failure.reason} (attempt policy error: ${errorMessage(err)})`,
        attempt,
      );
    }

    if (!retry) {
      log.info(
        { attempts: attempt, reason: failure.reason },
        `Failed to install after ${attempt} attempt(s)`,
      );
      return failedOutcome(target, failure.reason, attempt);
    }

    if (signal?.aborted) {
      log.info({ attempts: attempt }, "Cancelled between attempts");
      return cancelledOutcome(target, attempt);
    }

    log.debug({ attempt, delayMs }, "Retrying after backoff");
    emit({ type: "retry_scheduled", target, attempt, delayMs });

    const slept = await sleep(delayMs, signal);
    if (!slept) {
      log.info({ attempts: attempt }, "Cancelled during backoff");
      return cancelledOutcome(target, attempt);
    }
  }
}
