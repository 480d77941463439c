import { setTimeout as sleep } from "node:timers/promises";

export type WaitOutcome = "elapsed" | "stopped";

/**
 * Suspend for `ms` or until `signal` aborts, whichever comes first
 */
export async function waitForInterval(ms: number, signal: AbortSignal): Promise<WaitOutcome> {
  if (signal.aborted) return "stopped";

  try {
    await sleep(ms, undefined, { signal });
    return "elapsed";
  } catch (error) {
    if (signal.aborted) return "stopped";
    throw error;
  }
}
