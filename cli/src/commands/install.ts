/**
 * Provision CLI — Install Command
 *
 * Installs every group of a manifest, one group (batch) at a time.
 *
 * Usage:
 *   provision install                      Everything in the default manifest
 *   provision install brew-dev-tools go    Only these groups
 *   provision install --skip-brew          Everything except Homebrew
 *   provision install --dry-run            Show the plan, install nothing
 *
 * Output:
 *
 *   Development tools  (brew, 21 packages, 4 at a time)
 *
 *     → git already installed
 *     ✔ lazygit installed
 *     ✔ just installed (attempt 2/3)
 *     ✖ procs failed after 3 attempt(s): Error: Failed to download resource
 *
 *   ✔ 20 installed, 0 already present, 1 failed in 1m 12s
 *
 * The first Ctrl-C stops scheduling new packages and lets running ones
 * finish; the summary still covers every package. A second one exits
 * immediately. Failures are appended to the failure log.
 */

import { Command } from "commander";
import {
  BatchReport,
  EngineEvent,
  LogLevel,
  MergedReport,
  ProvisionEngine,
  ProvisionError,
  ensureVirtualenv,
  mergeReports,
  PolicyError,
} from "@provision/engine";
import { ensureDirectories, loadConfigOrExit } from "../config";
import { loadManifestOrExit } from "../catalog";
import { buildPlan, countTargets, PlanError, PlannedBatch } from "../plan";
import { appendFailures } from "../failure-log";
import {
  InstallerFactory,
  installerFactory,
  installerOptions,
  needsVirtualenv,
} from "../installers";
import {
  addSelectionOptions,
  parseNonNegativeInt,
  parsePositiveInt,
  SelectionOptions,
  toPlanOptions,
} from "../options";
import {
  colors,
  createSpinner,
  failureRows,
  formatCounts,
  formatDuration,
  formatOutcome,
  isDebugMode,
  printBlank,
  printDebug,
  printDetail,
  printDryRun,
  printError,
  printHeader,
  printInfo,
  printSuccess,
  printTable,
  printWarn,
} from "../output";

/** Conventional exit status after SIGINT */
export const EXIT_CANCELLED = 130;

interface InstallOptions extends SelectionOptions {
  attempts?: number;
  backoff?: number;
  dryRun: boolean;
  logFile?: string;
  strict: boolean;
}

export interface InstallRun {
  plan: PlannedBatch[];
  installerFor: InstallerFactory;
  signal: AbortSignal;
  /** Failures are appended here */
  logFile: string;
  /** Exit 1 when anything failed */
  strict?: boolean;
  logLevel?: LogLevel;
}

export interface InstallRunResult {
  report: MergedReport;
  exitCode: number;
}

function describeBatch(batch: PlannedBatch): string {
  const { group } = batch;
  const parallel = batch.concurrency > 1 ? `, ${batch.concurrency} at a time` : "";
  return (
    `${group.name}  ` +
    colors.dim(`(${group.manager}, ${batch.targets.length} packages${parallel})`)
  );
}

function printPlan(plan: PlannedBatch[]): void {
  printDryRun(`Would install ${countTargets(plan)} package(s) in ${plan.length} group(s)`);
  for (const batch of plan) {
    printHeader(describeBatch(batch));
    printDetail("Attempts", String(batch.policy.maxAttempts));
    printDetail("Backoff", formatDuration(batch.policy.backoff(1)));
    printDetail("Packages", batch.targets.map((t) => t.label ?? t.id).join(", "));
  }
  printBlank();
}

function printSummary(
  plan: PlannedBatch[],
  reports: BatchReport[],
  merged: MergedReport,
  elapsedMs: number,
): void {
  printBlank();

  if (plan.length > 1) {
    printTable({
      head: ["Group", "Manager", "Installed", "Present", "Failed"],
      rows: plan.map((batch, i) => {
        const counts = reports[i].counts;
        return [
          batch.group.id,
          colors.manager(batch.group.manager),
          String(counts.installed),
          String(counts.present),
          counts.failed > 0 ? colors.error(String(counts.failed)) : "0",
        ];
      }),
    });
    printBlank();
  }

  const summary = `${formatCounts(merged.counts)} in ${formatDuration(elapsedMs)}`;
  if (merged.counts.failed === 0) {
    printSuccess(summary);
    return;
  }
  printWarn(summary);
  printBlank();
  printTable({
    head: ["Package", "Attempts", "Reason"],
    rows: failureRows(merged.failures),
  });
}

/**
 * SIGINT/SIGTERM handler: the first signal cancels the run, a second one
 * exits at once with EXIT_CANCELLED.
 */
export function createInterruptHandler(
  controller: AbortController,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: NodeJS.Signals) => void {
  return (signal) => {
    if (controller.signal.aborted) {
      printError(`${signal} received again, exiting without waiting.`);
      exit(EXIT_CANCELLED);
      return;
    }
    printBlank();
    printWarn(
      `${signal} received: waiting for running installs, skipping the rest. ` +
        "Press Ctrl-C again to exit now.",
    );
    controller.abort();
  };
}

/**
 * Run every planned batch through one engine, print progress and the
 * summary, and append failures to the log. Install failures never throw;
 * they are in the report.
 */
export async function runInstall(run: InstallRun): Promise<InstallRunResult> {
  const { plan, signal } = run;
  const engine = new ProvisionEngine({ logLevel: run.logLevel ?? "silent" });
  const spinner = createSpinner("Starting...");
  let current: PlannedBatch | null = null;

  engine.on((event: EngineEvent) => {
    switch (event.type) {
      case "target_started":
        spinner.text = `Checking ${event.target.id}...`;
        break;
      case "attempt_started":
        spinner.text =
          event.attempt > 1
            ? `Installing ${event.target.id} (attempt ${event.attempt}/${event.maxAttempts})...`
            : `Installing ${event.target.id}...`;
        break;
      case "retry_scheduled":
        printDebug(
          `${event.target.id}: attempt ${event.attempt} failed, retrying in ${formatDuration(event.delayMs)}`,
        );
        break;
      case "target_finished": {
        spinner.stop();
        console.log(`  ${formatOutcome(event.outcome, current?.policy.maxAttempts)}`);
        const { completed, total } = event.progress;
        if (completed < total) {
          spinner.text = `${completed}/${total} done`;
          spinner.start();
        }
        break;
      }
      default:
        break;
    }
  });

  const reports: BatchReport[] = [];
  const startTime = Date.now();

  try {
    for (const batch of plan) {
      current = batch;
      printHeader(describeBatch(batch));
      spinner.start();
      const report = await engine.run(batch.targets, run.installerFor(batch.group.manager), {
        policy: batch.policy,
        concurrency: batch.concurrency,
        signal,
      });
      spinner.stop();
      reports.push(report);
    }
  } finally {
    spinner.stop();
    engine.close();
  }

  const merged = mergeReports(reports);
  printSummary(plan, reports, merged, Date.now() - startTime);

  if (merged.failures.length > 0) {
    appendFailures(run.logFile, merged.failures);
    printInfo(`Failures appended to ${colors.bold(run.logFile)}`);
  }

  let exitCode = 0;
  if (merged.cancelled) {
    exitCode = EXIT_CANCELLED;
  } else if (run.strict && merged.counts.failed > 0) {
    exitCode = 1;
  }
  return { report: merged, exitCode };
}

export function registerInstallCommand(program: Command): void {
  addSelectionOptions(
    program
      .command("install [groups...]")
      .alias("i")
      .description("Install the packages of a manifest, skipping what is already there"),
  )
    .option("-a, --attempts <n>", "Attempts per package", parsePositiveInt)
    .option("-b, --backoff <ms>", "Fixed delay between attempts, in milliseconds", parseNonNegativeInt)
    .option("--dry-run", "Show what would be installed without installing", false)
    .option("--log-file <path>", "Append failures to this file")
    .option("--strict", "Exit 1 if any package failed", false)
    .action(async (groups: string[], opts: InstallOptions) => {
      const config = loadConfigOrExit();
      const manifest = loadManifestOrExit(opts.manifest);

      // 1. Plan
      let plan: PlannedBatch[];
      try {
        const planOptions = toPlanOptions(groups, opts, config);
        plan = buildPlan(manifest, {
          ...planOptions,
          attempts: opts.attempts ?? planOptions.attempts,
          backoffMs: opts.backoff ?? planOptions.backoffMs,
        });
      } catch (err: unknown) {
        if (!(err instanceof PlanError || err instanceof PolicyError)) throw err;
        printError(err.message);
        process.exit(1);
      }

      if (plan.length === 0) {
        printInfo("Nothing to install: every group was filtered out.");
        return;
      }

      if (opts.dryRun) {
        printPlan(plan);
        return;
      }

      ensureDirectories(config);

      // 2. Python virtualenv
      if (needsVirtualenv(plan, config)) {
        try {
          const venv = await ensureVirtualenv(config.pythonVenv);
          if (venv.created) printSuccess(`Created virtualenv ${venv.dir}`);
        } catch (err: unknown) {
          if (!(err instanceof ProvisionError)) throw err;
          printWarn(`${err.message}; pip packages will fail.`);
        }
      }

      // 3. Cancellation
      const controller = new AbortController();
      const onSignal = createInterruptHandler(controller);
      process.on("SIGINT", onSignal);
      process.on("SIGTERM", onSignal);

      // 4. Run
      try {
        const { exitCode } = await runInstall({
          plan,
          installerFor: installerFactory(installerOptions(config)),
          signal: controller.signal,
          logFile: opts.logFile ?? config.failureLog,
          strict: opts.strict,
          logLevel: isDebugMode() ? "debug" : config.logLevel,
        });
        if (exitCode !== 0) process.exitCode = exitCode;
      } finally {
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
      }
    });
}
