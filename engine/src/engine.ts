/**
 * Provision Engine — Main Engine Class
 *
 * The engine takes a batch of targets and an Installer and drives every
 * target to exactly one outcome:
 * 1. Skips targets the installer reports as present
 * 2. Installs the rest, retrying per the attempt policy
 * 3. Runs at most `concurrency` targets at once
 * 4. Keeps going when a target fails
 * 5. Stops cooperatively when the caller aborts
 *
 * The engine has NO UI logic and persists nothing. It communicates via
 * return values and event callbacks; rendering and failure logs belong
 * to the caller.
 */

import {
  AttemptPolicy,
  Batch,
  BatchReport,
  EngineEvent,
  EngineEventHandler,
  EngineOptions,
  Installer,
  RunOptions,
  Target,
} from "./types";
import { createLogger, Logger } from "./utils/logger";
import { runPool } from "./utils/pool";
import { DEFAULT_POLICY } from "./policy";
import { DEFAULT_CONCURRENCY, runBatch, validateConcurrency } from "./scheduler";
import { errorMessage } from "./errors";

export interface PresenceEntry {
  target: Target;
  present: boolean;
  /** Set when the presence check itself failed */
  error?: string;
}

export class ProvisionEngine {
  private logger: Logger;
  private policy: AttemptPolicy;
  private concurrency: number;
  private eventHandlers: EngineEventHandler[] = [];
  private closed = false;

  /**
   * @throws SchedulerError if the default concurrency is invalid
   */
  constructor(options: EngineOptions = {}) {
    this.logger =
      options.logger ??
      createLogger({
        level: options.logLevel ?? (options.verbose ? "debug" : "silent"),
      });
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    validateConcurrency(this.concurrency);
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. CLI uses this to render progress.
   */
  on(handler: EngineEventHandler): void {
    this.eventHandlers.push(handler);
  }

  off(handler: EngineEventHandler): void {
    this.eventHandlers = this.eventHandlers.filter((h) => h !== handler);
  }

  private emit(event: EngineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        this.logger.warn(
          { event: event.type, error: errorMessage(err) },
          "Event handler threw",
        );
      }
    }
  }

  // ─── Core: Run ───────────────────────────────────────────────

  /**
   * Install a batch. Per-run options override the engine defaults.
   *
   * Resolves with a complete report even if every target failed.
   * Rejects only for invalid options or a closed engine.
   */
  async run(
    batch: Batch,
    installer: Installer,
    overrides: RunOptions = {},
  ): Promise<BatchReport> {
    this.ensureOpen();
    return runBatch(batch, installer, {
      policy: overrides.policy ?? this.policy,
      concurrency: overrides.concurrency ?? this.concurrency,
      signal: overrides.signal,
      logger: this.logger,
      onEvent: (event) => this.emit(event),
    });
  }

  // ─── Query ───────────────────────────────────────────────────

  /**
   * Presence check only, no installs. Entries come back in batch order.
   */
  async check(
    batch: Batch,
    installer: Installer,
    concurrency: number = this.concurrency,
  ): Promise<PresenceEntry[]> {
    this.ensureOpen();
    validateConcurrency(concurrency);

    const entries: PresenceEntry[] = new Array(batch.length);
    await runPool(batch, concurrency, async (target, index) => {
      try {
        entries[index] = { target, present: await installer.isPresent(target) };
      } catch (err: unknown) {
        const message = errorMessage(err);
        this.logger.warn(
          { target: target.id, error: message },
          "Presence check failed",
        );
        entries[index] = { target, present: false, error: message };
      }
    });
    return entries;
  }

  // ─── Cleanup ─────────────────────────────────────────────────

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error("ProvisionEngine is closed.");
    }
  }

  /**
   * Flush logs and refuse further runs.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.eventHandlers = [];
    this.logger.info("Engine shut down");
    this.logger.flush();
  }
}
