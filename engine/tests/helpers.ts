/**
 * Shared fixtures for engine tests: a scripted in-memory Installer and a
 * fake CommandRunner. Nothing here touches a real package manager.
 */

import { setTimeout as delay } from "timers/promises";
import type {
  InstallFailure,
  Installer,
  InstallResult,
  Target,
} from "../src/types";
import type {
  CommandOptions,
  CommandResult,
  CommandRunner,
} from "../src/installers/command-runner";

export interface ScriptedTarget {
  present?: boolean;
  presenceError?: string;
  /** Returned by successive install calls; once used up, installs succeed */
  failures?: InstallFailure[];
  /** Returned by every install call */
  alwaysFail?: InstallFailure;
  /** install() rejects with this message */
  throws?: string;
  /** Runs inside install(), before the result is returned */
  during?: () => void;
}

export const retryable = (reason = "transient"): InstallFailure => ({
  reason,
  retryable: true,
});

export const terminal = (reason = "terminal"): InstallFailure => ({
  reason,
  retryable: false,
});

export class ScriptedInstaller implements Installer {
  readonly installCalls = new Map<string, number>();
  readonly presenceCalls = new Map<string, number>();
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly script: Record<string, ScriptedTarget>,
    private readonly installDelayMs = 0,
  ) {}

  installCount(id: string): number {
    return this.installCalls.get(id) ?? 0;
  }

  get totalInstalls(): number {
    let total = 0;
    for (const count of this.installCalls.values()) total += count;
    return total;
  }

  async isPresent(target: Target): Promise<boolean> {
    this.presenceCalls.set(target.id, (this.presenceCalls.get(target.id) ?? 0) + 1);
    const entry = this.script[target.id] ?? {};
    if (entry.presenceError) throw new Error(entry.presenceError);
    return entry.present ?? false;
  }

  async install(target: Target): Promise<InstallResult> {
    const call = this.installCount(target.id);
    this.installCalls.set(target.id, call + 1);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      if (this.installDelayMs > 0) await delay(this.installDelayMs);
      const entry = this.script[target.id] ?? {};
      entry.during?.();
      if (entry.throws) throw new Error(entry.throws);
      if (entry.alwaysFail) return { success: false, failure: entry.alwaysFail };
      const failure = entry.failures?.[call];
      if (failure) return { success: false, failure };
      return { success: true };
    } finally {
      this.inFlight--;
    }
  }
}

export const targets = (...ids: string[]): Target[] => ids.map((id) => ({ id }));

export interface RecordedCommand {
  file: string;
  args: string[];
  env?: Record<string, string>;
}

/**
 * CommandRunner that answers from a lookup keyed by "file arg1 arg2 …".
 * Unknown commands exit 1 with empty output.
 */
export function fakeRunner(responses: Record<string, Partial<CommandResult>>): {
  runner: CommandRunner;
  calls: RecordedCommand[];
} {
  const calls: RecordedCommand[] = [];
  const runner: CommandRunner = async (
    file: string,
    args: readonly string[],
    options?: CommandOptions,
  ) => {
    calls.push({ file, args: [...args], env: options?.env });
    const response = responses[[file, ...args].join(" ")];
    return {
      exitCode: response?.exitCode ?? (response ? 0 : 1),
      stdout: response?.stdout ?? "",
      stderr: response?.stderr ?? "",
    };
  };
  return { runner, calls };
}
