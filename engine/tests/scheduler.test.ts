/**
 * Provision Engine — Scheduler Tests
 *
 * Batch-level behaviour: resilience to failing targets, the concurrency
 * bound, deterministic failure ordering, duplicate ids and cancellation.
 */

import { describe, it, expect } from "vitest";
import { runBatch } from "../src/scheduler";
import { SchedulerError } from "../src/errors";
import { createAttemptPolicy, fixedBackoff } from "../src/policy";
import type { EngineEvent } from "../src/types";
import { ScriptedInstaller, retryable, targets, terminal } from "./helpers";

const policy = createAttemptPolicy({ maxAttempts: 3, backoff: fixedBackoff(0) });

describe("runBatch", () => {
  it("produces the expected report for a mixed batch", async () => {
    const installer = new ScriptedInstaller({
      A: { present: true },
      B: { failures: [retryable(), retryable()] },
      C: { alwaysFail: retryable("keeps failing") },
    });

    const report = await runBatch(targets("A", "B", "C"), installer, { policy });

    expect(report.outcomes.get("A")?.kind).toBe("already_present");
    expect(report.outcomes.get("B")).toEqual({
      kind: "installed",
      target: { id: "B" },
      attempts: 3,
    });
    expect(report.outcomes.get("C")).toEqual({
      kind: "failed",
      target: { id: "C" },
      reason: "keeps failing",
      attempts: 3,
      cancelled: false,
    });
    expect(installer.installCount("A")).toBe(0);
    expect(installer.installCount("B")).toBe(3);
    expect(report.counts).toEqual({
      present: 1,
      installed: 1,
      failed: 1,
      cancelled: 0,
    });
    expect(report.cancelled).toBe(false);
    expect(report.order).toEqual(["A", "B", "C"]);
  });

  it("keeps going when one target always fails", async () => {
    const ids = ["git", "gh", "jq", "fzf", "bat", "tmux"];
    const installer = new ScriptedInstaller({
      jq: { alwaysFail: terminal("No available formula with the name \"jq\"") },
    });

    const report = await runBatch(targets(...ids), installer, { policy });

    expect(report.outcomes.size).toBe(6);
    const failed = ids.filter((id) => report.outcomes.get(id)?.kind === "failed");
    expect(failed).toEqual(["jq"]);
    expect(report.counts.installed).toBe(5);
  });

  it("never exceeds the concurrency bound", async () => {
    const installer = new ScriptedInstaller({}, 10);
    const ids = Array.from({ length: 8 }, (_, i) => `pkg-${i}`);

    const report = await runBatch(targets(...ids), installer, {
      policy,
      concurrency: 3,
    });

    expect(installer.maxInFlight).toBe(3);
    expect(report.counts.installed).toBe(8);
  });

  it("runs sequentially by default", async () => {
    const installer = new ScriptedInstaller({}, 5);

    await runBatch(targets("a", "b", "c", "d"), installer, { policy });

    expect(installer.maxInFlight).toBe(1);
  });

  it("lists failures in batch order, not completion order", async () => {
    // "slow" finishes last but comes first in the batch
    const installer = new ScriptedInstaller({
      slow: { failures: [retryable(), retryable(), retryable()] },
      fast: { alwaysFail: terminal("fast failure") },
    });
    const slowPolicy = createAttemptPolicy({
      maxAttempts: 3,
      backoff: fixedBackoff(5),
    });

    const report = await runBatch(targets("slow", "ok", "fast"), installer, {
      policy: slowPolicy,
      concurrency: 3,
    });

    expect(report.failures.map((f) => f.target.id)).toEqual(["slow", "fast"]);
    expect(report.failures[0]).toEqual({
      target: { id: "slow" },
      reason: "transient",
      attempts: 3,
      cancelled: false,
    });
  });

  it("collapses duplicate ids to their first occurrence", async () => {
    const installer = new ScriptedInstaller({});
    const batch = [
      { id: "node", label: "Node.js" },
      { id: "git" },
      { id: "node", label: "duplicate" },
    ];

    const report = await runBatch(batch, installer, { policy });

    expect(report.order).toEqual(["node", "git"]);
    expect(report.outcomes.get("node")?.target.label).toBe("Node.js");
    expect(installer.installCount("node")).toBe(1);
  });

  it("returns an empty report for an empty batch", async () => {
    const installer = new ScriptedInstaller({});

    const report = await runBatch([], installer, { policy, concurrency: 4 });

    expect(report.order).toEqual([]);
    expect(report.counts).toEqual({
      present: 0,
      installed: 0,
      failed: 0,
      cancelled: 0,
    });
  });

  it("throws synchronously for an invalid concurrency", () => {
    const installer = new ScriptedInstaller({});
    expect(() => runBatch(targets("a"), installer, { concurrency: 0 })).toThrow(
      SchedulerError,
    );
    expect(() => runBatch(targets("a"), installer, { concurrency: 1.5 })).toThrow(
      "concurrency must be an integer >= 1, got 1.5",
    );
  });

  it("emits batch, target and progress events", async () => {
    const installer = new ScriptedInstaller({ a: { present: true } });
    const events: EngineEvent[] = [];

    const report = await runBatch(targets("a", "b"), installer, {
      policy,
      batchId: "batch-1",
      onEvent: (e) => events.push(e),
    });

    expect(report.batchId).toBe("batch-1");
    expect(events.every((e) => e.batchId === "batch-1")).toBe(true);
    expect(events[0]).toMatchObject({
      type: "batch_started",
      total: 2,
      concurrency: 1,
    });
    const finished = events.filter((e) => e.type === "target_finished");
    expect(finished).toHaveLength(2);
    const last = finished[1];
    expect(last.type === "target_finished" && last.progress).toEqual({
      counts: { present: 1, installed: 1, failed: 0, cancelled: 0 },
      completed: 2,
      total: 2,
    });
    expect(events[events.length - 1].type).toBe("batch_finished");
  });

  it("survives an event handler that throws", async () => {
    const installer = new ScriptedInstaller({});

    const report = await runBatch(targets("a"), installer, {
      policy,
      onEvent: () => {
        throw new Error("renderer crashed");
      },
    });

    expect(report.counts.installed).toBe(1);
  });

  describe("cancellation", () => {
    it("marks targets that never started as cancelled", async () => {
      const controller = new AbortController();
      const installer = new ScriptedInstaller({
        first: { alwaysFail: retryable() },
      });
      const slow = createAttemptPolicy({
        maxAttempts: 3,
        backoff: fixedBackoff(60_000),
      });

      const report = await runBatch(targets("first", "second", "third"), installer, {
        policy: slow,
        signal: controller.signal,
        onEvent: (e) => {
          if (e.type === "retry_scheduled") controller.abort();
        },
      });

      expect(report.cancelled).toBe(true);
      expect(report.outcomes.size).toBe(3);
      expect(report.outcomes.get("first")).toMatchObject({
        kind: "failed",
        attempts: 1,
        cancelled: true,
      });
      expect(report.outcomes.get("second")).toMatchObject({
        kind: "failed",
        reason: "cancelled",
        attempts: 0,
        cancelled: true,
      });
      expect(installer.presenceCalls.has("second")).toBe(false);
      expect(installer.presenceCalls.has("third")).toBe(false);
      expect(report.counts).toEqual({
        present: 0,
        installed: 0,
        failed: 3,
        cancelled: 3,
      });
    });

    it("still reports a complete batch when aborted up front", async () => {
      const controller = new AbortController();
      controller.abort();
      const installer = new ScriptedInstaller({});

      const report = await runBatch(targets("a", "b"), installer, {
        policy,
        concurrency: 2,
        signal: controller.signal,
      });

      expect(report.order).toEqual(["a", "b"]);
      expect(report.failures.map((f) => f.cancelled)).toEqual([true, true]);
      expect(installer.totalInstalls).toBe(0);
    });
  });
});
