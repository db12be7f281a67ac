/**
 * Provision Engine — Attempt Policy
 *
 * How many times to try an install, how long to wait between tries, and
 * which failures are worth another try.
 *
 * The bootstrap scripts this engine replaces used 3 attempts everywhere,
 * but slept 1s (Homebrew formulae), 2s (generic retry wrapper) or 5s (Go
 * modules) between them. Those values are exposed as presets rather than
 * picking one.
 */

import { AttemptPolicy, BackoffFn, InstallFailure } from "./types";
import { PolicyError } from "./errors";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BACKOFF_MS = 2000;

export const BACKOFF_PRESETS = {
  brew: 1000,
  generic: 2000,
  go: 5000,
} as const;

// ─── Backoff Strategies ─────────────────────────────────────────

/** Same delay before every retry. */
export function fixedBackoff(delayMs: number): BackoffFn {
  return () => delayMs;
}

/** attempt × step: 1s, 2s, 3s … for a 1s step. */
export function linearBackoff(stepMs: number): BackoffFn {
  return (attempt) => attempt * stepMs;
}

/** base × 2^(attempt-1), capped at maxMs. */
export function exponentialBackoff(baseMs: number, maxMs: number): BackoffFn {
  return (attempt) => Math.min(baseMs * 2 ** (attempt - 1), maxMs);
}

/** Longest delay a Node timer honors (2^31 - 1 ms); longer ones fire at once. */
export const MAX_BACKOFF_MS = 2_147_483_647;

/**
 * Clamp whatever a backoff function returns to a usable sleep duration.
 */
export function resolveDelay(backoff: BackoffFn, attempt: number): number {
  const delay = backoff(attempt);
  if (!Number.isFinite(delay) || delay < 0) return 0;
  return Math.min(delay, MAX_BACKOFF_MS);
}

// ─── Retryability ───────────────────────────────────────────────

/**
 * Retry unless the installer adapter explicitly marked the failure terminal.
 */
export function defaultIsRetryable(failure: InstallFailure): boolean {
  return failure.retryable !== false;
}

// ─── Construction ───────────────────────────────────────────────

/**
 * Build a policy, filling in defaults.
 *
 * @throws PolicyError if maxAttempts is not an integer ≥ 1
 */
export function createAttemptPolicy(
  overrides: Partial<AttemptPolicy> = {},
): AttemptPolicy {
  const maxAttempts = overrides.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new PolicyError(
      `maxAttempts must be an integer >= 1, got ${maxAttempts}`,
    );
  }

  return Object.freeze({
    maxAttempts,
    backoff: overrides.backoff ?? fixedBackoff(DEFAULT_BACKOFF_MS),
    isRetryable: overrides.isRetryable ?? defaultIsRetryable,
  });
}

/** 3 attempts, 2s apart, adapter decides retryability. */
export const DEFAULT_POLICY: AttemptPolicy = createAttemptPolicy();
