/**
 * Provision Engine — Command Runner
 *
 * Every adapter shells out through a CommandRunner, which always resolves.
 * A missing binary comes back as exit code 127 (the shell's convention)
 * instead of a thrown ENOENT. Tests swap in a fake runner.
 */

import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

/** Package managers can be chatty; brew upgrades easily exceed the default. */
const MAX_BUFFER = 32 * 1024 * 1024;

export const EXIT_COMMAND_NOT_FOUND = 127;

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

interface ExecError extends Error {
  code?: number | string;
  stdout?: string;
  stderr?: string;
}

function isExecError(err: unknown): err is ExecError {
  return err instanceof Error && "code" in err;
}

/**
 * Default runner backed by child_process.execFile (no shell involved).
 */
export const execRunner: CommandRunner = async (file, args, options = {}) => {
  try {
    const { stdout, stderr } = await execFileAsync(file, [...args], {
      env: { ...process.env, ...options.env },
      maxBuffer: MAX_BUFFER,
    });
    return { exitCode: 0, stdout, stderr };
  } catch (err: unknown) {
    if (!isExecError(err)) throw err;

    if (err.code === "ENOENT") {
      return {
        exitCode: EXIT_COMMAND_NOT_FOUND,
        stdout: "",
        stderr: `${file}: command not found`,
      };
    }

    return {
      exitCode: typeof err.code === "number" ? err.code : 1,
      stdout: typeof err.stdout === "string" ? err.stdout : "",
      stderr: typeof err.stderr === "string" ? err.stderr : err.message,
    };
  }
};
