import { setTimeout as sleep } from "node:timers/promises";

import { BintrayError } from "./errors.js";
import type { ScopedLogger } from "./logger.js";

export type ProbeResult<T> = { done: true; value: T } | { done: false };

export type Probe<T> = (signal: AbortSignal) => Promise<ProbeResult<T>>;

export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
  /** Prefix for log lines and the timeout message. */
  label: string;
  log: ScopedLogger;
}

export function done<T>(value: T): ProbeResult<T> {
  return { done: true, value };
}

export const TRY_AGAIN: ProbeResult<never> = { done: false };

function timedOut(options: WaitOptions, cause?: unknown): BintrayError {
  return new BintrayError(
    "content-not-available",
    `${options.label}: content not available after ${options.timeoutMs} ms`,
    cause === undefined ? {} : { cause }
  );
}

/**
 * Calls `probe` until it reports completion, sleeping `intervalMs` between
 * attempts. The signal handed to each attempt aborts at the deadline.
 */
export async function waitForCondition<T>(probe: Probe<T>, options: WaitOptions): Promise<T> {
  const deadline = Date.now() + Math.max(0, options.timeoutMs);
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), Math.max(0, options.timeoutMs));

  try {
    for (let attempt = 1; ; attempt += 1) {
      options.log.trace(`${options.label}: attempt ${attempt}`);
      let result: ProbeResult<T>;
      try {
        result = await probe(controller.signal);
      } catch (error) {
        if (controller.signal.aborted) throw timedOut(options, error);
        throw error;
      }
      if (result.done) return result.value;

      const remaining = deadline - Date.now();
      if (remaining <= 0) throw timedOut(options);
      await sleep(Math.min(options.intervalMs, remaining));
      if (Date.now() >= deadline) throw timedOut(options);
    }
  } finally {
    clearTimeout(timer);
  }
}
