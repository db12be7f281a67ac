/**
 * Provision Engine — Structured Logger
 *
 * Wraps pino for structured logging. Everything goes to stderr so that
 * CLI output on stdout stays clean. Level "silent" (the default) emits
 * nothing at all.
 *
 * NOTE: pino.destination() instead of pino transports, since transports
 * spawn worker_threads that outlive short CLI runs.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
  /** Synchronous writes; turn off only for long-running hosts */
  sync: boolean;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
  sync: true,
};

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      level: opts.level,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: opts.sync }),
  );
}

export type Logger = pino.Logger;
