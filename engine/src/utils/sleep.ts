import { setTimeout as delay } from "timers/promises";

/**
 * Wait `ms` milliseconds unless `signal` aborts first.
 *
 * @returns true if the full delay elapsed, false if it was cut short
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  if (ms <= 0) return true;

  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (err: unknown) {
    if (signal?.aborted) return false;
    throw err;
  }
}
