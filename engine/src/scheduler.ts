/**
 * Provision Engine — Scheduler
 *
 * Fans a batch out to a fixed pool of workers. Each worker pulls the next
 * target (in batch order) and runs the dispatcher on it, so at most
 * `concurrency` targets are ever in flight, however large the batch.
 * A failed target never stops the others.
 *
 * Once the signal aborts, targets that have not started are recorded as
 * cancelled without touching the installer, so the report always holds
 * one outcome per distinct target id.
 */

import * as crypto from "crypto";
import {
  AttemptPolicy,
  Batch,
  BatchReport,
  EngineEvent,
  EngineEventHandler,
  EngineEventPayload,
  InstallOutcome,
  Installer,
  RunOptions,
  Target,
} from "./types";
import { SchedulerError, errorMessage } from "./errors";
import { DEFAULT_POLICY } from "./policy";
import { ReportBuilder } from "./report";
import { dispatchTarget, failedOutcome } from "./dispatcher";
import { createLogger, Logger } from "./utils/logger";
import { runPool } from "./utils/pool";

export const DEFAULT_CONCURRENCY = 1;

export interface ScheduleOptions extends RunOptions {
  logger?: Logger;
  onEvent?: EngineEventHandler;
  /** Defaults to a random UUID */
  batchId?: string;
}

/**
 * @throws SchedulerError when concurrency is not an integer ≥ 1
 */
export function validateConcurrency(concurrency: number): void {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new SchedulerError(
      `concurrency must be an integer >= 1, got ${concurrency}`,
    );
  }
}

/**
 * Drop repeated ids, keeping the first occurrence.
 */
function distinctTargets(batch: Batch, logger: Logger): Target[] {
  const seen = new Set<string>();
  const targets: Target[] = [];
  for (const target of batch) {
    if (seen.has(target.id)) {
      logger.warn({ target: target.id }, "Duplicate target in batch, ignoring");
      continue;
    }
    seen.add(target.id);
    targets.push(target);
  }
  return targets;
}

/**
 * Run every target of `batch` through the installer.
 *
 * Configuration problems throw synchronously; once running, the returned
 * promise always resolves with a complete report.
 */
export function runBatch(
  batch: Batch,
  installer: Installer,
  options: ScheduleOptions = {},
): Promise<BatchReport> {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  validateConcurrency(concurrency);

  return execute(batch, installer, {
    policy: options.policy ?? DEFAULT_POLICY,
    concurrency,
    signal: options.signal,
    logger: options.logger ?? createLogger(),
    onEvent: options.onEvent,
    batchId: options.batchId ?? crypto.randomUUID(),
  });
}

interface ExecutionPlan {
  policy: AttemptPolicy;
  concurrency: number;
  signal?: AbortSignal;
  logger: Logger;
  onEvent?: EngineEventHandler;
  batchId: string;
}

async function execute(
  batch: Batch,
  installer: Installer,
  plan: ExecutionPlan,
): Promise<BatchReport> {
  const { policy, concurrency, signal, batchId } = plan;
  const logger = plan.logger.child({ batch: batchId });
  const startedAt = new Date().toISOString();

  const emit = (payload: EngineEventPayload): void => {
    if (!plan.onEvent) return;
    const event: EngineEvent = {
      ...payload,
      timestamp: new Date().toISOString(),
      batchId,
    };
    try {
      plan.onEvent(event);
    } catch (err: unknown) {
      logger.warn(
        { event: event.type, error: errorMessage(err) },
        "Event handler threw",
      );
    }
  };

  const targets = distinctTargets(batch, logger);
  const report = new ReportBuilder(targets);
  const workerCount = Math.min(concurrency, targets.length);

  logger.info(
    { total: targets.length, concurrency: workerCount },
    "Starting batch",
  );
  emit({ type: "batch_started", total: targets.length, concurrency: workerCount });

  await runPool(targets, workerCount, async (target) => {
    let outcome: InstallOutcome;
    try {
      outcome = await dispatchTarget(target, installer, policy, {
        logger,
        signal,
        emit,
      });
    } catch (err: unknown) {
      logger.error(
        { target: target.id, error: errorMessage(err) },
        "Dispatcher failed unexpectedly",
      );
      outcome = failedOutcome(target, errorMessage(err), 0);
    }
    report.record(outcome);
    emit({ type: "target_finished", outcome, progress: report.progress() });
  });

  const result = report.finalize({
    batchId,
    startedAt,
    finishedAt: new Date().toISOString(),
    cancelled: signal?.aborted ?? false,
  });

  logger.info(
    { counts: result.counts, cancelled: result.cancelled },
    "Batch finished",
  );
  emit({ type: "batch_finished", report: result });

  return result;
}
