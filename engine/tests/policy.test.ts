/**
 * Provision Engine — Attempt Policy Tests
 */

import { describe, it, expect } from "vitest";
import {
  BACKOFF_PRESETS,
  DEFAULT_POLICY,
  createAttemptPolicy,
  defaultIsRetryable,
  exponentialBackoff,
  fixedBackoff,
  linearBackoff,
  resolveDelay,
  MAX_BACKOFF_MS,
} from "../src/policy";
import { PolicyError } from "../src/errors";

describe("createAttemptPolicy", () => {
  it("defaults to 3 attempts, 2s apart", () => {
    expect(DEFAULT_POLICY.maxAttempts).toBe(3);
    expect(DEFAULT_POLICY.backoff(1)).toBe(2000);
    expect(DEFAULT_POLICY.backoff(2)).toBe(2000);
  });

  it("keeps overrides", () => {
    const policy = createAttemptPolicy({
      maxAttempts: 5,
      backoff: fixedBackoff(BACKOFF_PRESETS.go),
    });
    expect(policy.maxAttempts).toBe(5);
    expect(policy.backoff(4)).toBe(5000);
  });

  it("rejects maxAttempts below 1", () => {
    expect(() => createAttemptPolicy({ maxAttempts: 0 })).toThrow(PolicyError);
  });

  it("rejects fractional maxAttempts", () => {
    expect(() => createAttemptPolicy({ maxAttempts: 2.5 })).toThrow(
      "maxAttempts must be an integer >= 1, got 2.5",
    );
  });

  it("is frozen", () => {
    expect(Object.isFrozen(createAttemptPolicy())).toBe(true);
  });
});

describe("defaultIsRetryable", () => {
  it("retries unless the failure is marked terminal", () => {
    expect(defaultIsRetryable({ reason: "x" })).toBe(true);
    expect(defaultIsRetryable({ reason: "x", retryable: true })).toBe(true);
    expect(defaultIsRetryable({ reason: "x", retryable: false })).toBe(false);
  });
});

describe("backoff strategies", () => {
  it("linear grows by one step per attempt", () => {
    const backoff = linearBackoff(1000);
    expect([1, 2, 3].map(backoff)).toEqual([1000, 2000, 3000]);
  });

  it("exponential doubles up to the cap", () => {
    const backoff = exponentialBackoff(500, 3000);
    expect([1, 2, 3, 4, 5].map(backoff)).toEqual([500, 1000, 2000, 3000, 3000]);
  });

  it("resolveDelay clamps negative and non-finite delays to 0", () => {
    expect(resolveDelay(() => -5, 1)).toBe(0);
    expect(resolveDelay(() => Number.NaN, 1)).toBe(0);
    expect(resolveDelay(() => Infinity, 1)).toBe(0);
    expect(resolveDelay(linearBackoff(10), 3)).toBe(30);
  });

  it("resolveDelay caps delays at the longest timer Node supports", () => {
    expect(MAX_BACKOFF_MS).toBe(2147483647);
    expect(resolveDelay(exponentialBackoff(1000, Number.MAX_SAFE_INTEGER), 24)).toBe(MAX_BACKOFF_MS);
    expect(resolveDelay(fixedBackoff(MAX_BACKOFF_MS + 1), 1)).toBe(MAX_BACKOFF_MS);
  });
});
