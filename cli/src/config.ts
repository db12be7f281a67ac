/**
 * Provision CLI — Configuration
 *
 * Central location for CLI paths, defaults, and environment overrides.
 * All Provision data lives under ~/.provision unless PROVISION_HOME says
 * otherwise.
 *
 * Environment variables (all optional):
 *   PROVISION_HOME         Data directory
 *   PROVISION_CONCURRENCY  Default concurrency for every group
 *   PROVISION_ATTEMPTS     Default attempts per package
 *   PROVISION_BACKOFF_MS   Fixed delay between attempts
 *   PROVISION_LOG_LEVEL    silent | debug | info | warn | error
 *   PROVISION_LOG_FILE     Failure log path
 *   PROVISION_VENV         Virtualenv for pip groups (default ~/.global_venv)
 *   PROVISION_PIP          pip executable; skips the virtualenv entirely
 *   PROVISION_CODE         VS Code launcher (default "code")
 */

import * as path from "path";
import * as os from "os";
import * as fs from "fs";
import { z } from "zod";
import type { LogLevel } from "@provision/engine";
import { printError } from "./output";

/** Unset and empty variables both count as "not given" */
const blankAsUndefined = (value: unknown) => (value === "" ? undefined : value);

const optionalInt = (min: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().min(min).optional());

export const EnvSchema = z.object({
  PROVISION_HOME: z.preprocess(blankAsUndefined, z.string().optional()),
  PROVISION_CONCURRENCY: optionalInt(1),
  PROVISION_ATTEMPTS: optionalInt(1),
  PROVISION_BACKOFF_MS: optionalInt(0),
  PROVISION_LOG_LEVEL: z.preprocess(
    blankAsUndefined,
    z.enum(["silent", "debug", "info", "warn", "error"]).optional(),
  ),
  PROVISION_LOG_FILE: z.preprocess(blankAsUndefined, z.string().optional()),
  PROVISION_VENV: z.preprocess(blankAsUndefined, z.string().optional()),
  PROVISION_PIP: z.preprocess(blankAsUndefined, z.string().optional()),
  PROVISION_CODE: z.preprocess(blankAsUndefined, z.string().optional()),
});

export interface CliConfig {
  /** Root data directory */
  home: string;
  /** Log directory */
  logsDir: string;
  /** One line appended per failed package */
  failureLog: string;
  concurrency?: number;
  attempts?: number;
  backoffMs?: number;
  logLevel: LogLevel;
  /** Created on demand before pip groups run */
  pythonVenv: string;
  /** Explicit pip; when set, no virtualenv is used */
  pipCommand?: string;
  codeCommand?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Build the CLI configuration from environment variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parse = EnvSchema.safeParse(env);
  if (!parse.success) {
    const problems = parse.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid environment:\n  ${problems.join("\n  ")}`);
  }

  const vars = parse.data;
  const home = vars.PROVISION_HOME ?? path.join(os.homedir(), ".provision");
  const logsDir = path.join(home, "logs");

  return {
    home,
    logsDir,
    failureLog: vars.PROVISION_LOG_FILE ?? path.join(logsDir, "setup_log.txt"),
    concurrency: vars.PROVISION_CONCURRENCY,
    attempts: vars.PROVISION_ATTEMPTS,
    backoffMs: vars.PROVISION_BACKOFF_MS,
    logLevel: vars.PROVISION_LOG_LEVEL ?? "silent",
    pythonVenv: vars.PROVISION_VENV ?? path.join(os.homedir(), ".global_venv"),
    pipCommand: vars.PROVISION_PIP,
    codeCommand: vars.PROVISION_CODE,
  };
}

/**
 * loadConfig() for command actions: report invalid variables and exit 1.
 */
export function loadConfigOrExit(): CliConfig {
  try {
    return loadConfig();
  } catch (err: unknown) {
    if (!(err instanceof ConfigError)) throw err;
    printError(err.message);
    process.exit(1);
  }
}

/**
 * Ensure the log directory exists.
 */
export function ensureDirectories(config: CliConfig): void {
  fs.mkdirSync(config.logsDir, { recursive: true });
}
