import { setTimeout as delay } from "node:timers/promises";

/** Delays used to pace the device, in milliseconds. */
export interface Timing {
  /** Wait after opening the port and again after the connect command. */
  connectSettle: number;
  /** Wait after every command write so the firmware can process it. */
  commandSettle: number;
  /** Pause between the safety stop and the start of an operation. */
  operationPause: number;
  /** Wait after a start/adjust command before polling resumes. */
  operationSettle: number;
  /** Interval between measurement reads. */
  pollInterval: number;
}

export const DEFAULT_TIMING: Timing = {
  connectSettle: 500,
  commandSettle: 100,
  operationPause: 1000,
  operationSettle: 2500,
  pollInterval: 1000,
};

export function resolveTiming(overrides: Partial<Timing> = {}): Timing {
  return { ...DEFAULT_TIMING, ...overrides };
}

/**
 * Sleep for `ms` milliseconds. Rejects with an `AbortError` when `signal`
 * fires first.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, signal ? { signal } : undefined);
}
